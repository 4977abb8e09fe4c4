/**
 * Debug Timing Utilities
 *
 * Measures middleware and reducer stages to flag slow ones during
 * development.
 */

import type { Phase } from '../types'

type TimingType = 'middleware' | 'reducer'

interface TimingMeta {
  phase: Phase
  stage: string
}

export interface TimingEvent extends TimingMeta {
  type: TimingType
  duration: number
  threshold: number
}

export interface TimingSummary {
  type: TimingType
  totalDuration: number
  operationCount: number
  slowOperations: TimingEvent[]
}

export type OnSlowOperation = (event: TimingEvent) => void
export type OnTimingSummary = (summary: TimingSummary) => void

const defaultOnSlowOperation =
  (prefix: string): OnSlowOperation =>
  (event) => {
    console.warn(
      `[${prefix}] Slow ${event.phase} stage: ${event.stage} took ${event.duration.toFixed(2)}ms (threshold: ${String(event.threshold)}ms)`,
    )
  }

const defaultOnTimingSummary =
  (prefix: string): OnTimingSummary =>
  (summary) => {
    if (summary.slowOperations.length > 0) {
      console.warn(
        `[${prefix}] ${summary.type}: ${String(summary.operationCount)} ops in ${summary.totalDuration.toFixed(2)}ms (${String(summary.slowOperations.length)} slow)`,
      )
    }
  }

export interface Timing {
  run: <T>(type: TimingType, fn: () => T, meta: TimingMeta) => T
  /** Account for a stage measured by the caller */
  record: (type: TimingType, duration: number, meta: TimingMeta) => void
  reportBatch: (type: TimingType) => void
}

interface TimingConfig {
  timing: boolean
  timingThreshold: number
  /** Prefix for default console warnings */
  prefix?: string
  onSlowOperation?: OnSlowOperation | undefined
  onSummary?: OnTimingSummary | undefined
}

interface TypeState {
  totalDuration: number
  operationCount: number
  slowOperations: TimingEvent[]
  warnedOperations: Set<string>
}

const createTypeState = (): TypeState => ({
  totalDuration: 0,
  operationCount: 0,
  slowOperations: [],
  warnedOperations: new Set(),
})

/**
 * Create a timing instance for a processor.
 * If timing is disabled, all methods are no-ops.
 */
export const createTiming = (options: TimingConfig): Timing => {
  const {
    timing,
    timingThreshold,
    prefix = 'action-pipeline',
    onSlowOperation = defaultOnSlowOperation(prefix),
    onSummary = defaultOnTimingSummary(prefix),
  } = options

  if (!timing) {
    return {
      run: (_type, fn) => fn(),
      record: () => {
        // Do nothing
      },
      reportBatch: () => {
        // Do nothing
      },
    }
  }

  // Hook faults are logged and never reach the stage being measured
  const notify = <E>(hook: (event: E) => void, event: E) => {
    try {
      hook(event)
    } catch (error) {
      console.error(`[${prefix}] Timing hook failed`, error)
    }
  }

  const state: Record<TimingType, TypeState> = {
    middleware: createTypeState(),
    reducer: createTypeState(),
  }

  const record = (type: TimingType, duration: number, meta: TimingMeta) => {
    const typeState = state[type]
    typeState.totalDuration += duration
    typeState.operationCount++

    if (duration > timingThreshold) {
      const event: TimingEvent = {
        ...meta,
        type,
        duration,
        threshold: timingThreshold,
      }
      typeState.slowOperations.push(event)

      const key = `${meta.phase}:${meta.stage}`
      if (!typeState.warnedOperations.has(key)) {
        typeState.warnedOperations.add(key)
        notify(onSlowOperation, event)
      }
    }
  }

  return {
    run: <T>(type: TimingType, fn: () => T, meta: TimingMeta): T => {
      const start = performance.now()
      const result = fn()
      record(type, performance.now() - start, meta)
      return result
    },

    record,

    reportBatch: (type: TimingType) => {
      const typeState = state[type]
      if (typeState.operationCount === 0) return

      notify(onSummary, {
        type,
        totalDuration: typeState.totalDuration,
        operationCount: typeState.operationCount,
        slowOperations: typeState.slowOperations,
      })

      // Reset batch counters but keep warned set to avoid spam
      typeState.totalDuration = 0
      typeState.operationCount = 0
      typeState.slowOperations = []
    },
  }
}
