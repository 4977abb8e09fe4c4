import type { Action } from './action'
import type { StageResult } from './reject'

/** Function form of a reducer: (state, action) to next state or REJECT */
export type ReduceFn<S, A extends Action = Action> = (
  state: S,
  action: A,
) => StageResult<S>

/**
 * Computes the next state for an action.
 *
 * Must not mutate `state`. Returning REJECT means the action produces no
 * new state and aborts the remainder of the pipeline.
 */
export interface Reducer<S, A extends Action = Action> {
  reduce: ReduceFn<S, A>
}

/** Either shape accepted wherever a reducer is configured */
export type ReducerInput<S, A extends Action = Action> =
  | Reducer<S, A>
  | ReduceFn<S, A>
