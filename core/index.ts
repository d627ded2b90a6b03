/**
 * Core library
 *
 * Every module in core/ is pure in-memory computation: no I/O, no
 * runtime-specific APIs, no third-party imports.
 */

// Semver - parsing, rendering and precedence
export * as semver from './semver/index.js'
export * from './semver/index.js'

// Errors - structured error types
export * from './errors/index.js'
