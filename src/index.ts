/**
 * action-pipeline
 *
 * Synchronous action processing with:
 * - A single reducer per processor
 * - Ordered pre/post middleware that can transform or veto an action
 * - Commit-or-reject semantics with a state-change observer
 * - Prebuilt validation (Zod) and routing middleware
 * - A valtio-backed store wrapper
 */

// =============================================================================
// CORE PUBLIC API
// =============================================================================

export type {
  DebugConfig,
  FaultHandler,
  ProcessorConfig,
  ProcessorOptions,
  RejectedHandler,
  StateChangeHandler,
} from './core/types'
export { resolveConfig, type ResolvedProcessorConfig } from './core/config'
export { DEFAULT_PROCESSOR_CONFIG } from './core/defaults'

export {
  type CreateProcessorOptions,
  createStateProcessor,
  type DefaultProcessorOptions,
  DefaultStateProcessor,
  StateProcessor,
} from './processor'

// Contracts
export type {
  Action,
  ActionCreator,
  ActionOf,
  DeepPartial,
  DeepRequired,
  FaultEvent,
  Middleware,
  MiddlewareApi,
  MiddlewareFn,
  MiddlewareInput,
  Phase,
  PipelineOutcome,
  PipelineStatus,
  PipelineTrace,
  ReduceFn,
  Reducer,
  ReducerInput,
  Reject,
  StageResult,
  StageTrace,
} from './types'
export { defineAction, isReject, REJECT } from './types'

// =============================================================================
// PREBUILTS & STORE
// =============================================================================

export {
  routeActions,
  validateAction,
  type ValidateActionOptions,
  validateState,
  type ValidateStateOptions,
  type ValidationIssue,
} from './prebuilts'

export { createStore } from './store/create-store'
export type { StateRef, StoreInstance } from './store/types'

// Debug tooling
export type {
  OnSlowOperation,
  OnTimingSummary,
  TimingEvent,
  TimingSummary,
} from './utils/timing'
