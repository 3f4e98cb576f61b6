import { NoMatchError } from './edaErrors'

export type ClosestDirection = 'both' | 'smaller' | 'greater'

export type ClosestMatch = {
  value: number
  index: number
}

export type FindClosestOptions = {
  direction?: ClosestDirection
  strictly?: boolean
}

function isCandidate(v: number, target: number, direction: ClosestDirection, strictly: boolean): boolean {
  if (Number.isNaN(v)) return false
  if (direction === 'smaller') return strictly ? v < target : v <= target
  if (direction === 'greater') return strictly ? v > target : v >= target
  return strictly ? v !== target : true
}

/**
 * Linear scan for the value of `values` closest to `target`.
 *
 * With `direction: 'smaller'` only values at or below the target count (strictly below when
 * `strictly` is set); `'greater'` mirrors that. Ties keep the first occurrence.
 */
export function findClosest(target: number, values: readonly number[], options: FindClosestOptions = {}): ClosestMatch {
  const direction = options.direction ?? 'both'
  const strictly = options.strictly ?? false

  let best: ClosestMatch | null = null
  let bestDistance = Infinity
  if (!Number.isNaN(target)) {
    for (let i = 0; i < values.length; i++) {
      const v = values[i]
      if (!isCandidate(v, target, direction, strictly)) continue
      const distance = Math.abs(v - target)
      if (!best || distance < bestDistance) {
        best = { value: v, index: i }
        bestDistance = distance
      }
    }
  }

  if (!best) {
    throw new NoMatchError(`No value ${describeDirection(direction, strictly)} ${target} among ${values.length} candidates`)
  }
  return best
}

function describeDirection(direction: ClosestDirection, strictly: boolean): string {
  if (direction === 'smaller') return strictly ? 'below' : 'at or below'
  if (direction === 'greater') return strictly ? 'above' : 'at or above'
  return strictly ? 'other than' : 'near'
}

/**
 * Largest element of an ascending sequence that is <= `target`, by binary search.
 * When the matched value repeats, the index of its first occurrence is returned.
 */
export function findLastAtOrBelow(sorted: readonly number[], target: number): ClosestMatch {
  let lo = 0
  let hi = sorted.length - 1
  let found = -1
  while (lo <= hi) {
    const mid = (lo + hi) >> 1
    if (sorted[mid] <= target) {
      found = mid
      lo = mid + 1
    } else {
      hi = mid - 1
    }
  }

  if (found < 0) {
    throw new NoMatchError(`No value at or below ${target} among ${sorted.length} candidates`)
  }

  const value = sorted[found]
  let index = found
  while (index > 0 && sorted[index - 1] === value) index--
  return { value, index }
}

export function isAscending(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (!(values[i - 1] <= values[i])) return false
  }
  return true
}
