/**
 * Central error classes and guard utilities for record-validator
 * @module utils/errors
 */

/**
 * Base error class for all record-validator errors
 */
export class RecordValidatorError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'RecordValidatorError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a record has no identifier.
 *
 * This signals malformed input, not an invalid record. Validation never
 * catches it; the caller decides whether to abort or skip.
 */
export class MissingIdentifierError extends RecordValidatorError {
  /** Position of the record in the input sequence, when known */
  public readonly index?: number
  /** Field names the record did carry */
  public readonly fields: string[]

  constructor(fields: string[], index?: number) {
    const where = index === undefined ? 'Record' : `Record at index ${index}`
    super(`${where} has no 'id' field`, 'MISSING_IDENTIFIER', {
      fields,
      index,
    })
    this.name = 'MissingIdentifierError'
    this.fields = fields
    this.index = index
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends RecordValidatorError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends RecordValidatorError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when records cannot be read or decoded
 */
export class RecordLoadError extends RecordValidatorError {
  public readonly source: string

  constructor(source: string, message: string, context?: Record<string, unknown>) {
    super(`Cannot load records from ${source}: ${message}`, 'RECORD_LOAD_ERROR', {
      source,
      ...context,
    })
    this.name = 'RecordLoadError'
    this.source = source
  }
}

// ==================== GUARD UTILITIES ====================

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: unknown, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Narrows a value to a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates that an object is a valid plain object (not null, not array)
 */
export function requirePlainObject(
  value: unknown,
  parameterName: string
): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a plain object'
    )
  }
  return value
}

/**
 * Check if an error is a record-validator error
 */
export function isRecordValidatorError(error: unknown): error is RecordValidatorError {
  return error instanceof RecordValidatorError
}
