/**
 * Custom error classes for next-csrf-protector
 */

/**
 * Base error class for all protector errors
 */
export class ProtectorError extends Error {
  /**
   * HTTP status code
   */
  public readonly statusCode: number

  /**
   * Error code for programmatic handling
   */
  public readonly code: string

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>

  constructor(
    message: string,
    options: {
      statusCode?: number
      code?: string
      details?: Record<string, unknown>
      cause?: unknown
    } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'ProtectorError'
    this.statusCode = options.statusCode ?? 500
    this.code = options.code ?? 'PROTECTOR_ERROR'
    this.details = options.details

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Convert error to JSON response
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    }
  }

  /**
   * Create a Response object from this error
   */
  toResponse(headers?: Record<string, string>): Response {
    return new Response(JSON.stringify(this.toJSON()), {
      status: this.statusCode,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
    })
  }
}

/**
 * CSRF token error (missing or mismatched token)
 */
export class CsrfError extends ProtectorError {
  constructor(
    message = 'Invalid or missing CSRF token',
    options: {
      details?: Record<string, unknown>
    } = {}
  ) {
    super(message, {
      statusCode: 403,
      code: 'CSRF_TOKEN_INVALID',
      details: options.details,
    })
    this.name = 'CsrfError'
  }
}

/**
 * Configuration error: the protector cannot start
 */
export class ConfigurationError extends ProtectorError {
  constructor(
    message: string,
    options: {
      details?: Record<string, unknown>
      cause?: unknown
    } = {}
  ) {
    super(message, {
      statusCode: 500,
      code: 'CONFIGURATION_ERROR',
      details: options.details,
      cause: options.cause,
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * The attack log could not be written
 */
export class LogSinkError extends ProtectorError {
  constructor(
    message = 'Unable to write to the log file',
    options: {
      details?: Record<string, unknown>
      cause?: unknown
    } = {}
  ) {
    super(message, {
      statusCode: 500,
      code: 'LOG_SINK_UNAVAILABLE',
      details: options.details,
      cause: options.cause,
    })
    this.name = 'LogSinkError'
  }
}

/**
 * Check if an error is a ProtectorError
 */
export function isProtectorError(error: unknown): error is ProtectorError {
  return error instanceof ProtectorError
}

/**
 * Convert unknown error to ProtectorError
 */
export function toProtectorError(error: unknown): ProtectorError {
  if (error instanceof ProtectorError) {
    return error
  }

  if (error instanceof Error) {
    return new ProtectorError(error.message, {
      cause: error,
    })
  }

  return new ProtectorError(String(error))
}
