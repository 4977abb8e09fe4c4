import type { Action } from './action'
import type { Phase } from './middleware'

/** Terminal state of one `process` call */
export type PipelineOutcome<S> =
  | { status: 'committed'; state: S }
  | {
      status: 'rejected'
      /** Working state handed to `rejected` */
      state: S
      phase: Phase
      /** Name of the rejecting stage */
      stage: string
    }
  | { status: 'aborted'; error: unknown }

export type PipelineStatus = PipelineOutcome<unknown>['status']

export interface FaultEvent<A extends Action = Action> {
  phase: Phase
  stage: string
  action: A
  error: unknown
}

export type StageStatus = 'applied' | 'rejected' | 'faulted'

export interface StageTrace {
  phase: Phase
  stage: string
  status: StageStatus
  durationMs: number
}

export interface PipelineTrace {
  action: string
  status: PipelineStatus
  stages: StageTrace[]
  durationMs: number
}
