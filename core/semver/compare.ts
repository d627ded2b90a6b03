/**
 * Semver Comparison Functions
 *
 * Precedence ordering, sorting, and version relationships.
 * Build metadata never takes part in precedence.
 */

import type { CompareResult, PrereleaseIdentifier } from './types'
import type { SemVer } from './version'
import { isNumericIdentifier } from './grammar'

function compareBigInt(a: bigint, b: bigint): CompareResult {
  if (a === b) return 0
  return a < b ? -1 : 1
}

function compareLength(a: number, b: number): CompareResult {
  if (a === b) return 0
  return a < b ? -1 : 1
}

// Code-unit order; identifiers are ASCII so this is byte order
function compareText(a: string, b: string): CompareResult {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Compare two prerelease identifiers.
 * Numeric identifiers compare numerically and always sort below
 * alphanumeric ones; alphanumeric identifiers compare in ASCII order.
 */
export function compareIdentifiers(
  a: PrereleaseIdentifier,
  b: PrereleaseIdentifier
): CompareResult {
  if (typeof a === 'bigint') {
    return typeof b === 'bigint' ? compareBigInt(a, b) : -1
  }
  if (typeof b === 'bigint') return 1
  return compareText(a, b)
}

function comparePrerelease(
  a: readonly PrereleaseIdentifier[],
  b: readonly PrereleaseIdentifier[]
): CompareResult {
  // A version without prerelease outranks any version with one
  if (a.length === 0) return b.length === 0 ? 0 : 1
  if (b.length === 0) return -1

  const len = Math.min(a.length, b.length)
  for (let i = 0; i < len; i++) {
    const ai = a[i]
    const bi = b[i]
    if (ai === undefined || bi === undefined) break

    const result = compareIdentifiers(ai, bi)
    if (result !== 0) return result
  }

  return compareLength(a.length, b.length)
}

/**
 * Compare two versions by precedence.
 * Returns:
 *  - -1 if v1 < v2
 *  -  0 if v1 == v2 (build metadata ignored)
 *  -  1 if v1 > v2
 */
export function compare(v1: SemVer, v2: SemVer): CompareResult {
  return (
    compareBigInt(v1.major, v2.major) ||
    compareBigInt(v1.minor, v2.minor) ||
    compareBigInt(v1.patch, v2.patch) ||
    comparePrerelease(v1.prerelease, v2.prerelease)
  )
}

/**
 * Reverse compare: rcompare(v1, v2) = compare(v2, v1)
 */
export function rcompare(v1: SemVer, v2: SemVer): CompareResult {
  return compare(v2, v1)
}

/**
 * v1 < v2
 */
export function lt(v1: SemVer, v2: SemVer): boolean {
  return compare(v1, v2) === -1
}

/**
 * v1 > v2
 */
export function gt(v1: SemVer, v2: SemVer): boolean {
  return compare(v1, v2) === 1
}

/**
 * v1 == v2 by precedence
 */
export function eq(v1: SemVer, v2: SemVer): boolean {
  return compare(v1, v2) === 0
}

/**
 * v1 != v2 by precedence
 */
export function neq(v1: SemVer, v2: SemVer): boolean {
  return compare(v1, v2) !== 0
}

/**
 * v1 <= v2
 */
export function lte(v1: SemVer, v2: SemVer): boolean {
  return compare(v1, v2) <= 0
}

/**
 * v1 >= v2
 */
export function gte(v1: SemVer, v2: SemVer): boolean {
  return compare(v1, v2) >= 0
}

/**
 * Structural equality, unlike `eq` this distinguishes build metadata
 */
export function equals(v1: SemVer, v2: SemVer): boolean {
  return v1.equals(v2)
}

// All-digit identifiers rank below the rest, as in prerelease precedence
function compareBuildIdentifiers(a: string, b: string): CompareResult {
  const aNumeric = isNumericIdentifier(a)
  const bNumeric = isNumericIdentifier(b)
  if (aNumeric && bNumeric) {
    // '01' and '1' are distinct build identifiers, fall back to text on a tie
    return compareBigInt(BigInt(a), BigInt(b)) || compareText(a, b)
  }
  if (aNumeric) return -1
  if (bNumeric) return 1
  return compareText(a, b)
}

/**
 * Compare build metadata (for sorting, not semver precedence).
 * Versions equal by precedence are ordered by their build metadata,
 * no build metadata sorting first.
 */
export function compareBuild(v1: SemVer, v2: SemVer): CompareResult {
  const result = compare(v1, v2)
  if (result !== 0) return result

  const a = v1.build
  const b = v2.build
  if (a.length === 0 || b.length === 0) {
    return compareLength(a.length, b.length)
  }

  const len = Math.min(a.length, b.length)
  for (let i = 0; i < len; i++) {
    const ai = a[i]
    const bi = b[i]
    if (ai === undefined || bi === undefined) break

    const order = compareBuildIdentifiers(ai, bi)
    if (order !== 0) return order
  }

  return compareLength(a.length, b.length)
}

/**
 * Sort versions ascending into a new array
 */
export function sort(versions: readonly SemVer[]): SemVer[] {
  return [...versions].sort(compareBuild)
}

/**
 * Sort versions descending into a new array
 */
export function rsort(versions: readonly SemVer[]): SemVer[] {
  return [...versions].sort((a, b) => compareBuild(b, a))
}

/**
 * Highest version by precedence, or undefined for an empty list
 */
export function max(versions: readonly SemVer[]): SemVer | undefined {
  let best: SemVer | undefined
  for (const version of versions) {
    if (best === undefined || gt(version, best)) best = version
  }
  return best
}

/**
 * Lowest version by precedence, or undefined for an empty list
 */
export function min(versions: readonly SemVer[]): SemVer | undefined {
  let best: SemVer | undefined
  for (const version of versions) {
    if (best === undefined || lt(version, best)) best = version
  }
  return best
}
