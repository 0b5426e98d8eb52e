/**
 * Pack version ordering.
 *
 * Pack versions are dot-separated sequences of non-negative integers
 * ("1.4.12"). Comparison is numeric per component, left to right, with
 * missing trailing components treated as zero.
 */

import { EmptyInputError, MalformedVersionError } from '../../core/errors.js'

export type VersionKey = readonly number[]

export const VersionOrder = {
  LESS: -1,
  EQUAL: 0,
  GREATER: 1,
} as const

export type VersionOrdering = (typeof VersionOrder)[keyof typeof VersionOrder]

/**
 * Parse a dot-delimited version string into its numeric components.
 *
 * @throws {MalformedVersionError} if the string is empty or any segment is not all digits
 */
export function parseVersion(version: string): VersionKey {
  if (version === '') {
    throw new MalformedVersionError(version)
  }
  return version.split('.').map((segment) => {
    if (!/^\d+$/.test(segment)) {
      throw new MalformedVersionError(version)
    }
    return parseInt(segment, 10)
  })
}

/** Compare two parsed keys, zero-padding the shorter one. */
export function compareVersionKeys(a: VersionKey, b: VersionKey): VersionOrdering {
  const length = Math.max(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0
    const right = b[i] ?? 0
    if (left < right) return VersionOrder.LESS
    if (left > right) return VersionOrder.GREATER
  }
  return VersionOrder.EQUAL
}

export function compareVersions(a: string, b: string): VersionOrdering {
  return compareVersionKeys(parseVersion(a), parseVersion(b))
}

/**
 * Return the version string with the greatest key. On ties the first
 * occurrence wins.
 *
 * @throws {EmptyInputError} when `versions` is empty
 * @throws {MalformedVersionError} when any element cannot be parsed
 */
export function maxByVersion(versions: readonly string[]): string {
  const [first, ...rest] = versions
  if (first === undefined) {
    throw new EmptyInputError()
  }

  let best = first
  let bestKey = parseVersion(first)
  for (const candidate of rest) {
    const key = parseVersion(candidate)
    if (compareVersionKeys(key, bestKey) === VersionOrder.GREATER) {
      best = candidate
      bestKey = key
    }
  }
  return best
}
