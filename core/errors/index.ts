/**
 * Semver Error Types
 *
 * Structured error types for version handling with:
 * - Typed error codes for programmatic handling
 * - Context carrying the offending input
 * - JSON serialization for transport
 */

import type { ParseFailureReason } from '../semver/types'

// =============================================================================
// Error Code Types
// =============================================================================

/**
 * Error codes for version operations
 */
export type SemverErrorCode =
  | 'EPARSE'         // Text does not conform to the SemVer 2.0.0 grammar

// =============================================================================
// Error Context Types
// =============================================================================

/**
 * Context attached to an error
 */
export interface SemverErrorContext {
  input?: string
  reason?: ParseFailureReason
}

/**
 * JSON-serializable error representation
 */
export interface SemverErrorJSON {
  name: string
  code: SemverErrorCode
  message: string
  context?: SemverErrorContext
  stack?: string
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for version operations
 */
export class SemverError extends Error {
  readonly code: SemverErrorCode
  readonly context?: SemverErrorContext

  constructor(
    code: SemverErrorCode,
    message: string,
    context?: SemverErrorContext
  ) {
    super(message)
    this.name = 'SemverError'
    this.code = code
    this.context = context

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for JSON transport
   */
  toJSON(): SemverErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    }
  }

  /**
   * Create an error from its JSON representation.
   * Parse errors that carry their input come back as ParseError.
   */
  static fromJSON(json: SemverErrorJSON): SemverError {
    const input = json.context?.input
    const error =
      json.code === 'EPARSE' && input !== undefined
        ? new ParseError(input, json.context?.reason ?? 'malformed')
        : new SemverError(json.code, json.message, json.context)
    if (json.stack) {
      error.stack = json.stack
    }
    return error
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Text is not a valid SemVer 2.0.0 version
 */
export class ParseError extends SemverError {
  /** The rejected text, verbatim */
  readonly input: string
  readonly reason: ParseFailureReason

  constructor(input: string, reason: ParseFailureReason) {
    super('EPARSE', `Invalid version: ${JSON.stringify(input)}`, { input, reason })
    this.name = 'ParseError'
    this.input = input
    this.reason = reason
  }
}

// =============================================================================
// Error Type Guards
// =============================================================================

/**
 * Check if an error is a SemverError
 */
export function isSemverError(error: unknown): error is SemverError {
  return error instanceof SemverError
}

/**
 * Check if an error is a ParseError
 */
export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: SemverErrorCode): boolean {
  return isSemverError(error) && error.code === code
}
