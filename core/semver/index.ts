/**
 * Semver - Semantic Versioning 2.0.0
 *
 * Strict parsing, canonical rendering, and precedence ordering.
 */

// Types
export type {
  NumericInput,
  PrereleaseIdentifier,
  BuildIdentifier,
  SemVerObject,
  CompareResult,
  ParseFailureReason,
  ParseResult,
} from './types'

// Value type
export { SemVer } from './version'

// Parsing
export { parse, valid, isValid } from './parse'

// Rendering
export { format, formatPrerelease, formatBuild } from './format'

// Comparison
export {
  compare,
  compareIdentifiers,
  rcompare,
  lt,
  gt,
  eq,
  neq,
  lte,
  gte,
  equals,
  compareBuild,
  sort,
  rsort,
  max,
  min,
} from './compare'
