/**
 * Tests for timing utilities
 *
 * Verifies slow stage detection and batch summaries.
 */

import { afterEach, describe, expect, it, vi } from 'vitest'

import { createTiming, type TimingEvent } from '~/utils/timing'

const busyWait = (ms: number) => {
  const start = Date.now()
  while (Date.now() - start < ms) {
    // busy wait
  }
  return 'done'
}

describe('createTiming', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('when timing is enabled', () => {
    const config = { timing: true, timingThreshold: 5 }

    it('should return the function result', () => {
      const timing = createTiming(config)
      const result = timing.run('reducer', () => 42, {
        phase: 'reduce',
        stage: 'postsReducer',
      })
      expect(result).toBe(42)
    })

    it('should call onSlowOperation when a stage exceeds the threshold', () => {
      const onSlowOperation = vi.fn()
      const timing = createTiming({ ...config, onSlowOperation })

      timing.run('middleware', () => busyWait(10), {
        phase: 'pre',
        stage: 'auth',
      })

      expect(onSlowOperation).toHaveBeenCalledTimes(1)
      expect(onSlowOperation).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'middleware',
          phase: 'pre',
          stage: 'auth',
          threshold: 5,
        }),
      )

      const event = onSlowOperation.mock.calls[0]?.[0] as TimingEvent
      expect(event.duration).toBeGreaterThan(5)
    })

    it('should warn once per stage', () => {
      const onSlowOperation = vi.fn()
      const timing = createTiming({ ...config, onSlowOperation })

      for (let i = 0; i < 3; i++) {
        timing.run('middleware', () => busyWait(10), {
          phase: 'pre',
          stage: 'auth',
        })
      }

      expect(onSlowOperation).toHaveBeenCalledTimes(1)
    })

    it('should warn with the prefix by default', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {
        // silence
      })
      const timing = createTiming({ ...config, prefix: 'posts' })

      timing.run('middleware', () => busyWait(10), {
        phase: 'post',
        stage: 'enrich',
      })

      expect(warn).toHaveBeenCalledTimes(1)
      expect(String(warn.mock.calls[0]?.[0])).toMatch(
        /^\[posts\] Slow post stage: enrich took \d+\.\d{2}ms \(threshold: 5ms\)$/,
      )
    })

    it('should log a throwing hook instead of raising it', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {
        // silence
      })
      const timing = createTiming({
        ...config,
        prefix: 'posts',
        onSlowOperation: () => {
          throw new Error('hook failed')
        },
      })

      expect(() => {
        timing.record('reducer', 20, { phase: 'reduce', stage: 'postsReducer' })
      }).not.toThrow()
      expect(error).toHaveBeenCalledTimes(1)
      expect(error.mock.calls[0]?.[0]).toBe('[posts] Timing hook failed')
    })

    it('should report and reset batch counters', () => {
      const onSummary = vi.fn()
      const timing = createTiming({ ...config, onSummary })

      timing.run('reducer', () => 1, { phase: 'reduce', stage: 'a' })
      timing.run('reducer', () => 2, { phase: 'reduce', stage: 'a' })
      timing.reportBatch('reducer')
      timing.reportBatch('reducer')

      expect(onSummary).toHaveBeenCalledTimes(1)
      expect(onSummary).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'reducer', operationCount: 2 }),
      )
    })
  })

  describe('when timing is disabled', () => {
    it('should run the function without reporting', () => {
      const onSlowOperation = vi.fn()
      const onSummary = vi.fn()
      const timing = createTiming({
        timing: false,
        timingThreshold: 0,
        onSlowOperation,
        onSummary,
      })

      const result = timing.run('middleware', () => busyWait(2), {
        phase: 'pre',
        stage: 'auth',
      })
      timing.reportBatch('middleware')

      expect(result).toBe('done')
      expect(onSlowOperation).not.toHaveBeenCalled()
      expect(onSummary).not.toHaveBeenCalled()
    })
  })
})
