/**
 * Semver Grammar
 *
 * The SemVer 2.0.0 grammar as a single anchored pattern, identifier
 * classification, and diagnosis of rejected input.
 */

import type { ParseFailureReason, PrereleaseIdentifier } from './types'

const NUMERIC = '0|[1-9]\\d*'
const PRERELEASE_ID = `(?:${NUMERIC}|\\d*[a-zA-Z-][0-9a-zA-Z-]*)`
const BUILD_ID = '[0-9a-zA-Z-]+'

/**
 * Source of the grammar published at semver.org, with named groups
 */
export const VERSION_PATTERN_SOURCE =
  `^(?<major>${NUMERIC})\\.(?<minor>${NUMERIC})\\.(?<patch>${NUMERIC})` +
  `(?:-(?<prerelease>${PRERELEASE_ID}(?:\\.${PRERELEASE_ID})*))?` +
  `(?:\\+(?<buildmetadata>${BUILD_ID}(?:\\.${BUILD_ID})*))?$`

// No g/y flags: the shared instance must not carry lastIndex between calls
let versionPattern: RegExp | undefined

/**
 * The compiled grammar, built on first use
 */
export function getVersionPattern(): RegExp {
  versionPattern ??= new RegExp(VERSION_PATTERN_SOURCE)
  return versionPattern
}

const DIGITS = /^\d+$/
const OUTSIDE_ALPHABET = /[^0-9A-Za-z.+-]/

/**
 * True for identifiers made only of decimal digits
 */
export function isNumericIdentifier(identifier: string): boolean {
  return DIGITS.test(identifier)
}

/**
 * Tag each dotted prerelease identifier as numeric (bigint) or alphanumeric (string)
 */
export function splitPrerelease(preRelease: string): PrereleaseIdentifier[] {
  return preRelease
    .split('.')
    .map((id) => (isNumericIdentifier(id) ? BigInt(id) : id))
}

function hasLeadingZero(identifier: string): boolean {
  return identifier.length > 1 && identifier.startsWith('0') && isNumericIdentifier(identifier)
}

/**
 * Explain why the grammar rejected `text`.
 *
 * Only meaningful for input the grammar has already rejected; the
 * accept/reject decision never depends on this scan.
 */
export function diagnose(text: string): ParseFailureReason {
  if (text === '') return 'empty-input'
  if (OUTSIDE_ALPHABET.test(text)) return 'invalid-character'

  const plus = text.indexOf('+')
  if (plus !== -1 && text.includes('+', plus + 1)) return 'malformed'

  const head = plus === -1 ? text : text.slice(0, plus)
  const build = plus === -1 ? undefined : text.slice(plus + 1)

  const dash = head.indexOf('-')
  const core = dash === -1 ? head : head.slice(0, dash)
  const preRelease = dash === -1 ? undefined : head.slice(dash + 1)

  const components = core.split('.')
  if (components.length < 3) return 'missing-component'
  if (components.length > 3) return 'malformed'

  for (const component of components) {
    if (!isNumericIdentifier(component)) return 'non-numeric-component'
    if (hasLeadingZero(component)) return 'leading-zero'
  }

  if (preRelease !== undefined) {
    for (const id of preRelease.split('.')) {
      if (id === '') return 'empty-identifier'
      if (hasLeadingZero(id)) return 'leading-zero'
    }
  }

  if (build !== undefined) {
    for (const id of build.split('.')) {
      if (id === '') return 'empty-identifier'
    }
  }

  return 'malformed'
}
