/**
 * SemVer value type
 */

import type {
  BuildIdentifier,
  CompareResult,
  NumericInput,
  PrereleaseIdentifier,
  SemVerObject,
} from './types'
import { splitPrerelease } from './grammar'
import { compare as comparePrecedence } from './compare'
import { formatVersion } from './format'

/**
 * An immutable Semantic Versioning 2.0.0 version.
 *
 * The constructor does not validate: callers passing components by hand are
 * responsible for their conformance. Use `parse` for untrusted text.
 *
 * Instances are frozen. A subclass is left unfrozen by this constructor so
 * it can initialise its own fields; it should freeze itself afterwards.
 *
 * @example
 * ```typescript
 * const v = new SemVer(1, 0, 0, 'rc.1', 'build.5')
 * v.toString()   // '1.0.0-rc.1+build.5'
 * v.prerelease   // ['rc', 1n]
 * ```
 */
export class SemVer implements SemVerObject {
  readonly major: bigint
  readonly minor: bigint
  readonly patch: bigint
  readonly preRelease: string | undefined
  readonly buildMeta: string | undefined

  /** Prerelease identifiers, numeric ones as bigint (e.g. ['alpha', 1n]) */
  readonly prerelease: readonly PrereleaseIdentifier[]
  /** Build metadata identifiers (e.g. ['build', '001']) */
  readonly build: readonly BuildIdentifier[]

  constructor(
    major: NumericInput,
    minor: NumericInput,
    patch: NumericInput,
    preRelease?: string,
    buildMeta?: string
  ) {
    this.major = BigInt(major)
    this.minor = BigInt(minor)
    this.patch = BigInt(patch)
    this.preRelease = preRelease
    this.buildMeta = buildMeta
    this.prerelease = Object.freeze(preRelease === undefined ? [] : splitPrerelease(preRelease))
    this.build = Object.freeze(buildMeta === undefined ? [] : buildMeta.split('.'))
    // Subclasses freeze themselves once their own fields are set
    if (new.target === SemVer) Object.freeze(this)
  }

  /**
   * Canonical version string
   */
  toString(): string {
    return formatVersion(this)
  }

  toJSON(): string {
    return this.toString()
  }

  /**
   * Precedence comparison; build metadata is ignored
   */
  compare(other: SemVer): CompareResult {
    return comparePrecedence(this, other)
  }

  /**
   * Structural equality on all five fields, build metadata included
   */
  equals(other: SemVerObject): boolean {
    return (
      this.major === other.major &&
      this.minor === other.minor &&
      this.patch === other.patch &&
      this.preRelease === other.preRelease &&
      this.buildMeta === other.buildMeta
    )
  }
}
