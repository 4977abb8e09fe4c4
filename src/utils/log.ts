/**
 * Processor logger: console logging for dispatches, faults and rejections.
 *
 * Pipeline traces are opt-in (debug.logPipeline) and cost nothing when off.
 * Faults and rejections are always printed: they are the only place a
 * swallowed error surfaces.
 */

import type { Action, FaultEvent, PipelineTrace, StageTrace } from '../types'
import { is } from './is'

export interface ProcessorLogger {
  logPipeline: (trace: PipelineTrace) => void
  logFault: (event: FaultEvent) => void
  logRejected: (state: unknown, action: Action) => void
}

interface LoggerConfig {
  name: string
  logPipeline: boolean
}

const noop = () => {
  // no-op
}

const formatDuration = (ms: number): string => `${ms.toFixed(2)}ms`

/** Build console summary object for a pipeline run. @internal */
export const buildTraceSummary = (
  trace: PipelineTrace,
): Record<string, unknown> => {
  const summary: Record<string, unknown> = {
    status: trace.status,
    duration: formatDuration(trace.durationMs),
  }

  const stages: Record<string, string> = {}
  for (const [i, s] of trace.stages.entries()) {
    const key = `[${String(i).padStart(2, '0')}] ${s.phase}:${s.stage}`
    stages[key] = describeStage(s)
  }
  if (trace.stages.length > 0) {
    summary['stages'] = stages
  }

  return summary
}

const describeStage = (s: StageTrace): string =>
  s.durationMs > 0 ? `${s.status} ${formatDuration(s.durationMs)}` : s.status

/** Short description of a thrown value for the log line */
const describeError = (error: unknown): string => {
  if (is.error(error)) return error.message
  if (is.string(error)) return error
  try {
    return String(error)
  } catch {
    // null-prototype objects have no toString
    return Object.prototype.toString.call(error)
  }
}

export const createLogger = (config: LoggerConfig): ProcessorLogger => {
  const { name } = config

  return {
    logPipeline: config.logPipeline
      ? (trace) => {
          console.groupCollapsed(
            `${name}:pipeline | ${trace.action} → ${trace.status}`,
          )
          console.log(buildTraceSummary(trace))
          console.groupEnd()
        }
      : noop,

    logFault: (event) => {
      console.error(
        `${name}:fault | ${event.phase} ${event.stage} ${event.action.name}: ${describeError(event.error)}`,
        event.error,
      )
    },

    logRejected: (state, action) => {
      console.info(`${name}:rejected | ${action.name}`, { action, state })
    },
  }
}
