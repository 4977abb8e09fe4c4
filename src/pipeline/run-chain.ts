/**
 * Middleware chain runner
 *
 * Runs one ordered middleware list against a working state:
 * - a state result becomes the new working state
 * - REJECT stops the chain and reports which entry rejected
 * - a thrown fault is reported and the entry is skipped; the next entry
 *   receives the value from before the faulting call
 */

import type {
  Action,
  FaultEvent,
  MiddlewareEntry,
  Phase,
  StageResult,
  StageTrace,
} from '../types'
import { isReject } from '../types'
import type { Timing } from '../utils/timing'

export interface StageContext<A extends Action> {
  action: A
  timing: Timing
  onFault: (event: FaultEvent<A>) => void
  /** Collected in place so the caller owns the trace */
  stages: StageTrace[]
}

export type ChainResult<S> =
  | { rejected: false; state: S }
  | { rejected: true; state: S; stage: string }

type StageCall<S> =
  | { ok: true; result: StageResult<S> }
  | { ok: false; error: unknown }

/** Invoke a single stage, timing it and catching any fault */
export const callStage = <S, A extends Action>(
  entry: MiddlewareEntry<S, A>,
  phase: Phase,
  state: S,
  ctx: StageContext<A>,
): StageCall<S> => {
  const start = performance.now()

  let result: StageResult<S>
  try {
    result = entry.fn(state, ctx.action)
  } catch (error) {
    ctx.stages.push({
      phase,
      stage: entry.name,
      status: 'faulted',
      durationMs: performance.now() - start,
    })
    ctx.onFault({ phase, stage: entry.name, action: ctx.action, error })
    return { ok: false, error }
  }

  const durationMs = performance.now() - start
  ctx.stages.push({
    phase,
    stage: entry.name,
    status: isReject(result) ? 'rejected' : 'applied',
    durationMs,
  })
  ctx.timing.record(
    phase === 'reduce' ? 'reducer' : 'middleware',
    durationMs,
    { phase, stage: entry.name },
  )
  return { ok: true, result }
}

export const runChain = <S, A extends Action>(
  entries: readonly MiddlewareEntry<S, A>[],
  phase: Exclude<Phase, 'reduce'>,
  state: S,
  ctx: StageContext<A>,
): ChainResult<S> => {
  let working = state

  for (const entry of entries) {
    const call = callStage(entry, phase, working, ctx)
    if (!call.ok) continue

    if (isReject(call.result)) {
      return { rejected: true, state: working, stage: entry.name }
    }
    working = call.result
  }

  return { rejected: false, state: working }
}
