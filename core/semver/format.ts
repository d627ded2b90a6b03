/**
 * Semver Rendering
 *
 * Emit the canonical text of a version. Nothing is normalized: the
 * prerelease and build metadata are written back exactly as stored.
 */

import type { BuildIdentifier, PrereleaseIdentifier, SemVerObject } from './types'

/**
 * Format version string from components
 */
export function formatVersion(version: SemVerObject): string {
  let text = `${version.major}.${version.minor}.${version.patch}`
  if (version.preRelease !== undefined) {
    text += `-${version.preRelease}`
  }
  if (version.buildMeta !== undefined) {
    text += `+${version.buildMeta}`
  }
  return text
}

/**
 * Join prerelease identifiers back into their dotted form
 */
export function formatPrerelease(identifiers: readonly PrereleaseIdentifier[]): string {
  return identifiers.map(String).join('.')
}

/**
 * Join build metadata identifiers back into their dotted form
 */
export function formatBuild(identifiers: readonly BuildIdentifier[]): string {
  return identifiers.join('.')
}

export { formatVersion as format }
