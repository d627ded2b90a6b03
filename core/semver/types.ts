/**
 * Semver Types
 *
 * Type definitions for Semantic Versioning 2.0.0 values.
 */

import type { ParseError } from '../errors/index.js'
import type { SemVer } from './version'

/**
 * Numeric version field input. Numbers are converted with `BigInt`.
 */
export type NumericInput = bigint | number

/**
 * Prerelease identifier - bigint when numeric, string when alphanumeric
 */
export type PrereleaseIdentifier = bigint | string

/**
 * Build metadata identifier - always string (leading zeros are kept)
 */
export type BuildIdentifier = string

/**
 * Plain data shape of a version
 */
export interface SemVerObject {
  /** Major version number */
  readonly major: bigint
  /** Minor version number */
  readonly minor: bigint
  /** Patch version number */
  readonly patch: bigint
  /** Dotted prerelease exactly as given (e.g. 'alpha.1') */
  readonly preRelease: string | undefined
  /** Dotted build metadata exactly as given (e.g. 'build.123') */
  readonly buildMeta: string | undefined
}

/**
 * Comparison result: -1 (less), 0 (equal), 1 (greater)
 */
export type CompareResult = -1 | 0 | 1

/**
 * Why a string was rejected by the parser
 */
export type ParseFailureReason =
  | 'empty-input'
  | 'invalid-character'
  | 'missing-component'
  | 'non-numeric-component'
  | 'leading-zero'
  | 'empty-identifier'
  | 'malformed'

/**
 * Outcome of parsing a version string
 */
export type ParseResult =
  | { readonly ok: true; readonly version: SemVer }
  | { readonly ok: false; readonly error: ParseError }
