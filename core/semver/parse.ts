/**
 * Semver Parsing
 *
 * Strict SemVer 2.0.0 parsing. Anything the grammar does not match exactly
 * is rejected; there is no loose mode, prefix stripping, or coercion.
 */

import type { ParseResult } from './types'
import { ParseError } from '../errors/index.js'
import { diagnose, getVersionPattern } from './grammar'
import { SemVer } from './version'

/**
 * Parse a version string.
 *
 * @example
 * ```typescript
 * const result = parse('1.0.0-alpha.1+build.5')
 * if (result.ok) {
 *   result.version.prerelease // ['alpha', 1n]
 * } else {
 *   result.error.input        // the rejected text
 * }
 * ```
 */
export function parse(text: string): ParseResult {
  const groups = getVersionPattern().exec(text)?.groups
  const major = groups?.major
  const minor = groups?.minor
  const patch = groups?.patch

  if (groups === undefined || major === undefined || minor === undefined || patch === undefined) {
    return { ok: false, error: new ParseError(text, diagnose(text)) }
  }

  return {
    ok: true,
    version: new SemVer(
      BigInt(major),
      BigInt(minor),
      BigInt(patch),
      groups.prerelease,
      groups.buildmetadata
    ),
  }
}

/**
 * Return the version string if valid, or null
 */
export function valid(text: string): string | null {
  const result = parse(text)
  return result.ok ? result.version.toString() : null
}

/**
 * Check whether text is a valid version
 */
export function isValid(text: string): boolean {
  return getVersionPattern().test(text)
}
