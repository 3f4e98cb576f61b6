import { describe, expect, it } from 'vitest'

import { NoMatchError } from './edaErrors'
import { findClosest, findLastAtOrBelow, isAscending } from './findClosest'

describe('findLastAtOrBelow', () => {
  it('returns the largest value at or below the target', () => {
    expect(findLastAtOrBelow([10, 20, 30], 25)).toEqual({ value: 20, index: 1 })
    expect(findLastAtOrBelow([10, 20, 30], 99)).toEqual({ value: 30, index: 2 })
  })

  it('accepts an exact match', () => {
    expect(findLastAtOrBelow([10, 20, 30], 20)).toEqual({ value: 20, index: 1 })
    expect(findLastAtOrBelow([10, 20, 30], 10)).toEqual({ value: 10, index: 0 })
  })

  it('resolves repeated values to their first occurrence', () => {
    expect(findLastAtOrBelow([10, 20, 20, 20, 30], 25)).toEqual({ value: 20, index: 1 })
    expect(findLastAtOrBelow([5, 5], 5)).toEqual({ value: 5, index: 0 })
  })

  it('throws NoMatchError when every value is above the target', () => {
    expect(() => findLastAtOrBelow([10, 20], 5)).toThrow(NoMatchError)
    expect(() => findLastAtOrBelow([], 5)).toThrow(NoMatchError)
    expect(() => findLastAtOrBelow([10, 20], Number.NaN)).toThrow(NoMatchError)
  })

  it('agrees with a brute-force scan', () => {
    const ref = [0, 3, 3, 7, 12, 12, 12, 20]
    for (let q = 0; q <= 25; q++) {
      const m = findLastAtOrBelow(ref, q)
      expect(m.value).toBeLessThanOrEqual(q)
      expect(ref.some((r) => r > m.value && r <= q)).toBe(false)
      expect(m.index).toBe(ref.indexOf(m.value))
    }
  })
})

describe('findClosest', () => {
  it('picks the nearest value in either direction by default', () => {
    expect(findClosest(8, [1, 10, 5])).toEqual({ value: 10, index: 1 })
  })

  it('keeps the first of two equally close values', () => {
    expect(findClosest(5, [4, 6])).toEqual({ value: 4, index: 0 })
  })

  it('restricts to smaller values on unsorted input', () => {
    expect(findClosest(25, [30, 20, 10, 22], { direction: 'smaller' })).toEqual({ value: 22, index: 3 })
  })

  it('restricts to greater values', () => {
    expect(findClosest(25, [30, 20, 10, 27], { direction: 'greater' })).toEqual({ value: 27, index: 3 })
  })

  it('excludes equal values when strictly is set', () => {
    expect(findClosest(5, [5, 3], { direction: 'smaller' })).toEqual({ value: 5, index: 0 })
    expect(findClosest(5, [5, 3], { direction: 'smaller', strictly: true })).toEqual({ value: 3, index: 1 })
    expect(findClosest(5, [5, 9, 2], { strictly: true })).toEqual({ value: 2, index: 2 })
  })

  it('treats infinite values as candidates and skips NaN', () => {
    expect(findClosest(0, [-Infinity], { direction: 'smaller' })).toEqual({ value: -Infinity, index: 0 })
    expect(findLastAtOrBelow([-Infinity], 0)).toEqual({ value: -Infinity, index: 0 })
    expect(findClosest(0, [NaN, -Infinity], { direction: 'smaller' })).toEqual({ value: -Infinity, index: 1 })
    expect(() => findClosest(0, [NaN])).toThrow(NoMatchError)
  })

  it('throws NoMatchError without candidates', () => {
    expect(() => findClosest(5, [6, 7], { direction: 'smaller' })).toThrow(NoMatchError)
    expect(() => findClosest(5, [5], { direction: 'greater', strictly: true })).toThrow('No value above 5 among 1 candidates')
  })
})

describe('isAscending', () => {
  it('accepts non-decreasing sequences only', () => {
    expect(isAscending([])).toBe(true)
    expect(isAscending([1, 1, 2])).toBe(true)
    expect(isAscending([2, 1])).toBe(false)
  })
})
