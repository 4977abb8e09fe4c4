export {
  type Action,
  type ActionCreator,
  type ActionOf,
  defineAction,
} from './action'
export type {
  Middleware,
  MiddlewareApi,
  MiddlewareEntry,
  MiddlewareFn,
  MiddlewareInput,
  Phase,
} from './middleware'
export type {
  FaultEvent,
  PipelineOutcome,
  PipelineStatus,
  PipelineTrace,
  StageStatus,
  StageTrace,
} from './pipeline'
export type { ReduceFn, Reducer, ReducerInput } from './reducer'
export { isReject, REJECT, type Reject, type StageResult } from './reject'
export type { DeepPartial, DeepRequired } from './utils'
