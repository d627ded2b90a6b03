import { parse, type SemVer } from '../core/semver'

/**
 * Parse text that the test expects to be valid
 */
export function v(text: string): SemVer {
  const result = parse(text)
  if (!result.ok) {
    throw result.error
  }
  return result.version
}
