/**
 * Reject sentinel
 *
 * Returned by a reducer or middleware to stop the pipeline for the current
 * action without committing. It is a unique symbol so it can never collide
 * with a state value, including `null` and `undefined`.
 */

export const REJECT: unique symbol = Symbol('action-pipeline/reject')

export type Reject = typeof REJECT

/** Result of any pipeline stage: the next state, or a rejection */
export type StageResult<S> = S | Reject

export const isReject = (value: unknown): value is Reject => value === REJECT
