import { z } from 'zod'

import type { DeepRequired } from '../types'
import { deepMerge } from '../utils/deep-merge'
import { DEFAULT_PROCESSOR_CONFIG } from './defaults'
import type { ProcessorConfig } from './types'

const processorConfigSchema = z.object({
  name: z.string().min(1),
  detectReentrancy: z.boolean(),
  debug: z.object({
    logPipeline: z.boolean(),
    timing: z.boolean(),
    timingThreshold: z.number().nonnegative(),
  }),
})

export type ResolvedProcessorConfig = DeepRequired<ProcessorConfig>

/**
 * Merge user config over the defaults and validate the result.
 * @throws Error listing every invalid field
 */
export const resolveConfig = (
  config?: ProcessorConfig,
): ResolvedProcessorConfig => {
  const merged = deepMerge(DEFAULT_PROCESSOR_CONFIG, config)
  const result = processorConfigSchema.safeParse(merged)

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid processor config. ${details}`)
  }

  return result.data
}
