export { normalizeMiddleware, normalizeReducer, reducerName } from './normalize'
export {
  type PipelineContext,
  type PipelineRun,
  type PipelineStages,
  processAction,
} from './process-action'
export { type ChainResult, callStage, runChain, type StageContext } from './run-chain'
