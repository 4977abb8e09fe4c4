/**
 * Middleware and reducer normalization
 *
 * Middleware arrives as a standalone object or as an inline function that
 * also receives the processor's MiddlewareApi. Both become one
 * `{ name, fn }` entry at registration time so the chain runner only ever
 * sees a single shape.
 */

import type {
  Action,
  MiddlewareApi,
  MiddlewareEntry,
  MiddlewareInput,
  Phase,
  Reducer,
  ReducerInput,
} from '../types'

const fallbackName = (phase: Phase, index: number): string =>
  `${phase}#${String(index)}`

export const normalizeMiddleware = <S, A extends Action>(
  input: MiddlewareInput<S, A>,
  api: MiddlewareApi<S>,
  phase: Phase,
  index: number,
): MiddlewareEntry<S, A> => {
  if (typeof input === 'function') {
    return {
      name: input.name || fallbackName(phase, index),
      fn: (state, action) => input(state, action, api),
    }
  }

  return {
    name: input.name ?? fallbackName(phase, index),
    // Called as a method so class-based middleware keeps its `this`
    fn: (state, action) => input.reduce(state, action),
  }
}

export const normalizeReducer = <S, A extends Action>(
  input: ReducerInput<S, A>,
): Reducer<S, A> => (typeof input === 'function' ? { reduce: input } : input)

/** Stage name for a reducer in traces and fault reports */
export const reducerName = <S, A extends Action>(
  input: ReducerInput<S, A>,
): string => {
  if (typeof input === 'function') return input.name || 'reducer'
  // Class instances report their class; plain objects have nothing useful
  if (Object.getPrototypeOf(input) === Object.prototype) return 'reducer'
  return input.constructor.name || 'reducer'
}
