/**
 * Type checking utilities, similar to lodash type guards
 *
 * Provides type-safe predicates for common type checks with TypeScript support
 */

/** Check if value is undefined */
const isUndefined = (value: unknown): value is undefined => value === undefined

/** Check if value is a plain object (not null, array, Date, RegExp, class instances, etc.) */
const isObject = (value: unknown): value is Record<string, unknown> => {
  if (value == null || typeof value !== 'object' || Array.isArray(value))
    return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/** Check if value is a string */
const isString = (value: unknown): value is string => typeof value === 'string'

/** Check if value is an Error instance */
const isError = (value: unknown): value is Error => value instanceof Error

export const is = {
  undefined: isUndefined,
  object: isObject,
  string: isString,
  error: isError,
}
