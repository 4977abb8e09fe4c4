export {
  type CreateProcessorOptions,
  createStateProcessor,
} from './create-state-processor'
export {
  type DefaultProcessorOptions,
  DefaultStateProcessor,
} from './default-state-processor'
export { StateProcessor } from './state-processor'
