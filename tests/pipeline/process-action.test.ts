import { describe, expect, it, vi } from 'vitest'

import { type PipelineStages, processAction } from '~/pipeline/process-action'
import { type Action, type MiddlewareEntry, REJECT } from '~/types'
import { createTiming } from '~/utils/timing'

const action: Action = { name: 'Test' }

const entry = (
  name: string,
  fn: MiddlewareEntry<number, Action>['fn'],
): MiddlewareEntry<number, Action> => ({ name, fn })

const context = () => ({
  timing: createTiming({ timing: false, timingThreshold: 5 }),
  onFault: vi.fn(),
})

const stages = (
  overrides: Partial<PipelineStages<number, Action>> = {},
): PipelineStages<number, Action> => ({
  pre: [],
  reducer: entry('reducer', (s) => s + 10),
  post: [],
  ...overrides,
})

describe('processAction', () => {
  it('commits pre → reducer → post', () => {
    const run = processAction(
      1,
      action,
      stages({
        pre: [entry('double', (s) => s * 2)],
        post: [entry('negate', (s) => -s)],
      }),
      context(),
    )

    expect(run.outcome).toEqual({ status: 'committed', state: -12 })
    expect(run.trace.action).toBe('Test')
    expect(run.trace.status).toBe('committed')
    expect(run.trace.stages.map((s) => `${s.phase}:${s.stage}`)).toEqual([
      'pre:double',
      'reduce:reducer',
      'post:negate',
    ])
  })

  it('reports a pre rejection with the working state', () => {
    const reducer = vi.fn((s: number) => s)
    const run = processAction(
      1,
      action,
      stages({
        pre: [entry('add', (s) => s + 1), entry('veto', () => REJECT)],
        reducer: entry('reducer', reducer),
      }),
      context(),
    )

    expect(run.outcome).toEqual({
      status: 'rejected',
      state: 2,
      phase: 'pre',
      stage: 'veto',
    })
    expect(reducer).not.toHaveBeenCalled()
  })

  it('reports a reducer rejection with the reducer input', () => {
    const run = processAction(
      1,
      action,
      stages({
        pre: [entry('add', (s) => s + 1)],
        reducer: entry('postsReducer', () => REJECT),
      }),
      context(),
    )

    expect(run.outcome).toEqual({
      status: 'rejected',
      state: 2,
      phase: 'reduce',
      stage: 'postsReducer',
    })
  })

  it('aborts on a reducer fault and reports it once', () => {
    const ctx = context()
    const error = new Error('reducer exploded')
    const post = vi.fn((s: number) => s)
    const run = processAction(
      1,
      action,
      stages({
        reducer: entry('reducer', () => {
          throw error
        }),
        post: [entry('post', post)],
      }),
      ctx,
    )

    expect(run.outcome).toEqual({ status: 'aborted', error })
    expect(run.trace.status).toBe('aborted')
    expect(ctx.onFault).toHaveBeenCalledTimes(1)
    expect(ctx.onFault).toHaveBeenCalledWith({
      phase: 'reduce',
      stage: 'reducer',
      action,
      error,
    })
    expect(post).not.toHaveBeenCalled()
  })

  it('reports a post rejection with the post working state', () => {
    const run = processAction(
      0,
      action,
      stages({
        post: [entry('add', (s) => s + 1), entry('veto', () => REJECT)],
      }),
      context(),
    )

    expect(run.outcome).toEqual({
      status: 'rejected',
      state: 11,
      phase: 'post',
      stage: 'veto',
    })
  })
})
