/**
 * Core Processor Types
 *
 * Configuration and construction options shared by every processor.
 */

import type {
  Action,
  FaultEvent,
  MiddlewareInput,
  ReducerInput,
} from '../types'
import type { OnSlowOperation, OnTimingSummary } from '../utils/timing'

/**
 * Debug configuration for development tooling
 */
export interface DebugConfig {
  /** Print a collapsed console group per dispatch with the stage trace */
  logPipeline?: boolean
  /** Enable timing measurement for middleware and reducer stages */
  timing?: boolean
  /** Threshold in milliseconds for slow stage warnings (default: 5ms) */
  timingThreshold?: number
}

export interface ProcessorConfig {
  /** Label used as the log prefix (default: "processor") */
  name?: string
  /** Throw when dispatch is re-entered while stages are running (default: true) */
  detectReentrancy?: boolean
  /** Debug configuration for development tooling */
  debug?: DebugConfig
}

export type StateChangeHandler<S> = (state: S) => void

export type RejectedHandler<S, A extends Action = Action> = (
  state: S,
  action: A,
) => void

export type FaultHandler<A extends Action = Action> = (
  event: FaultEvent<A>,
) => void

export interface ProcessorOptions<S, A extends Action = Action> {
  reducer?: ReducerInput<S, A>
  pre?: MiddlewareInput<S, A>[]
  post?: MiddlewareInput<S, A>[]
  onStateChange?: StateChangeHandler<S>
  /** Receives middleware and reducer faults. Defaults to console.error */
  onFault?: FaultHandler<A>
  /** Overrides for slow stage reporting when debug.timing is on */
  onSlowOperation?: OnSlowOperation
  onTimingSummary?: OnTimingSummary
  config?: ProcessorConfig
}
