import type { DeepRequired } from '../types'
import type { ProcessorConfig } from './types'

export const DEFAULT_PROCESSOR_CONFIG: DeepRequired<ProcessorConfig> = {
  name: 'processor',
  detectReentrancy: true,
  debug: {
    logPipeline: false,
    timing: false,
    timingThreshold: 5,
  },
}
