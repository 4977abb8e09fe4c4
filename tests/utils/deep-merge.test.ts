import { describe, expect, it } from 'vitest'

import { deepMerge } from '~/utils/deep-merge'

describe('deepMerge', () => {
  it('should return target when source is undefined', () => {
    const target = { a: 1, b: 2 }
    expect(deepMerge(target)).toBe(target)
  })

  it('should not mutate target', () => {
    const target = { a: 1, nested: { x: 1 } }
    const result = deepMerge(target, { a: 2, nested: { x: 2 } })

    expect(target).toEqual({ a: 1, nested: { x: 1 } })
    expect(result).toEqual({ a: 2, nested: { x: 2 } })
  })

  it('should recursively merge nested plain objects', () => {
    const target = { debug: { timing: false, timingThreshold: 5 } }
    const result = deepMerge(target, { debug: { timing: true } })

    expect(result).toEqual({ debug: { timing: true, timingThreshold: 5 } })
  })

  it('should skip undefined source values', () => {
    const result = deepMerge({ a: 1, b: 2 }, { a: undefined })

    expect(result).toEqual({ a: 1, b: 2 })
  })

  it('should replace arrays wholesale', () => {
    const result = deepMerge({ list: [1, 2, 3] }, { list: [4] })

    expect(result).toEqual({ list: [4] })
  })
})
