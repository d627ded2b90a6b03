/**
 * strict-semver - Semantic Versioning 2.0.0 as a value type
 *
 * Parse version text strictly, render it back byte for byte, and order
 * versions by precedence.
 *
 * @example
 * ```typescript
 * import { parse, compare } from 'strict-semver'
 *
 * const a = parse('1.0.0-beta.2')
 * const b = parse('1.0.0-beta.11')
 * if (a.ok && b.ok) {
 *   compare(a.version, b.version) // -1
 * }
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index.js'
