/**
 * Pipeline algorithm
 *
 * pre chain → reducer → post chain, producing a PipelineOutcome.
 * Committing and the rejected hook belong to the processor; this module
 * never touches processor state.
 *
 * Fault handling is asymmetric: a faulting middleware is skipped and its
 * chain continues, while a faulting reducer aborts the whole run without a
 * rejection.
 */

import type {
  Action,
  FaultEvent,
  MiddlewareEntry,
  PipelineOutcome,
  PipelineTrace,
  StageTrace,
} from '../types'
import { isReject } from '../types'
import type { Timing } from '../utils/timing'
import { callStage, runChain, type StageContext } from './run-chain'

export interface PipelineStages<S, A extends Action> {
  pre: readonly MiddlewareEntry<S, A>[]
  reducer: MiddlewareEntry<S, A>
  post: readonly MiddlewareEntry<S, A>[]
}

export interface PipelineContext<A extends Action> {
  timing: Timing
  onFault: (event: FaultEvent<A>) => void
}

export interface PipelineRun<S> {
  outcome: PipelineOutcome<S>
  trace: PipelineTrace
}

export const processAction = <S, A extends Action>(
  state: S,
  action: A,
  stages: PipelineStages<S, A>,
  context: PipelineContext<A>,
): PipelineRun<S> => {
  const start = performance.now()
  const trace: StageTrace[] = []
  const ctx: StageContext<A> = {
    action,
    timing: context.timing,
    onFault: context.onFault,
    stages: trace,
  }

  const finish = (outcome: PipelineOutcome<S>): PipelineRun<S> => {
    context.timing.reportBatch('middleware')
    context.timing.reportBatch('reducer')
    return {
      outcome,
      trace: {
        action: action.name,
        status: outcome.status,
        stages: trace,
        durationMs: performance.now() - start,
      },
    }
  }

  const pre = runChain(stages.pre, 'pre', state, ctx)
  if (pre.rejected) {
    return finish({
      status: 'rejected',
      state: pre.state,
      phase: 'pre',
      stage: pre.stage,
    })
  }

  const reduced = callStage(stages.reducer, 'reduce', pre.state, ctx)
  if (!reduced.ok) {
    return finish({ status: 'aborted', error: reduced.error })
  }
  if (isReject(reduced.result)) {
    return finish({
      status: 'rejected',
      state: pre.state,
      phase: 'reduce',
      stage: stages.reducer.name,
    })
  }

  const post = runChain(stages.post, 'post', reduced.result, ctx)
  if (post.rejected) {
    return finish({
      status: 'rejected',
      state: post.state,
      phase: 'post',
      stage: post.stage,
    })
  }

  return finish({ status: 'committed', state: post.state })
}
