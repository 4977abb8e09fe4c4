import type { Action } from './action'
import type { Reject, StageResult } from './reject'

/**
 * Capabilities handed to inline middleware functions.
 * Reading state here returns the last committed value, not the working one.
 */
export interface MiddlewareApi<S> {
  /** Processor name from config */
  readonly name: string
  readonly reject: Reject
  getState: () => S
}

/** Standalone middleware object. Same shape as a Reducer, plus an optional name for traces */
export interface Middleware<S, A extends Action = Action> {
  name?: string
  reduce: (state: S, action: A) => StageResult<S>
}

/** Inline middleware closed over the owning processor's capabilities */
export type MiddlewareFn<S, A extends Action = Action> = (
  state: S,
  action: A,
  api: MiddlewareApi<S>,
) => StageResult<S>

export type MiddlewareInput<S, A extends Action = Action> =
  | Middleware<S, A>
  | MiddlewareFn<S, A>

export type Phase = 'pre' | 'reduce' | 'post'

/** Normalized middleware entry as stored by the processor */
export interface MiddlewareEntry<S, A extends Action = Action> {
  name: string
  fn: (state: S, action: A) => StageResult<S>
}
