import type { DeepPartial } from '../types'
import { is } from './is'

/**
 * Merge `source` over `target`, recursing into plain objects only.
 * Arrays and class instances are replaced wholesale; undefined source values
 * keep the target value. Neither argument is mutated.
 */
export const deepMerge = <T extends object>(
  target: T,
  source?: DeepPartial<T>,
): T => {
  if (!source) return target

  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(target)) {
    result[key] = value
  }

  for (const [key, sourceValue] of Object.entries(source)) {
    if (is.undefined(sourceValue)) continue

    const targetValue = result[key]
    result[key] =
      is.object(sourceValue) && is.object(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue
  }

  // Keys come from T and DeepPartial<T>; the shape is preserved
  return result as T
}
