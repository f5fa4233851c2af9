// Error types for the theme resolution service

/**
 * Error severity levels for categorization and handling
 */
export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'info'

/**
 * Error categories for grouping and filtering
 */
export type ErrorCategory = 'filesystem' | 'parse' | 'validation' | 'config' | 'unknown'

/**
 * Structured error context for debugging
 */
export interface ErrorContext {
  operation: string
  component?: string
  metadata?: Record<string, unknown>
}

/**
 * Base error class with enhanced context
 */
export class AppError extends Error {
  public readonly code: string
  public readonly severity: ErrorSeverity
  public readonly category: ErrorCategory
  public readonly context: ErrorContext
  public readonly timestamp: number
  public readonly isOperational: boolean

  constructor(
    message: string,
    options: {
      code?: string
      severity?: ErrorSeverity
      category?: ErrorCategory
      context: ErrorContext
      cause?: Error
      isOperational?: boolean
    }
  ) {
    super(message)
    this.name = 'AppError'
    this.code = options.code ?? 'ERR_UNKNOWN'
    this.severity = options.severity ?? 'error'
    this.category = options.category ?? 'unknown'
    this.context = options.context
    this.timestamp = Date.now()
    this.isOperational = options.isOperational ?? true
    this.cause = options.cause

    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      category: this.category,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    }
  }
}

/**
 * A theme source (global settings or a level document) could not be turned
 * into a config tree: unreadable file, YAML syntax error, or a `ui_theme`
 * block that is not a mapping.
 */
export class ThemeSourceError extends AppError {
  public readonly origin: string

  constructor(
    message: string,
    options: {
      origin: string
      stage: 'read' | 'parse' | 'shape'
      cause?: Error
    }
  ) {
    super(message, {
      code: 'ERR_THEME_SOURCE',
      severity: 'error',
      category: options.stage === 'read' ? 'filesystem' : 'parse',
      context: {
        operation: `theme:${options.stage}`,
        component: 'ThemeSourceLoader',
        metadata: { origin: options.origin },
      },
      cause: options.cause,
    })
    this.name = 'ThemeSourceError'
    this.origin = options.origin
  }
}

/**
 * A value present in a theme source failed kind validation.
 * Recovered locally: the tier is treated as absent for that key.
 */
export class ValueShapeError extends AppError {
  public readonly path: string
  public readonly value: unknown

  constructor(
    message: string,
    options: {
      path: string
      value: unknown
      origin: string
    }
  ) {
    super(message, {
      code: 'ERR_VALUE_SHAPE',
      severity: 'warning',
      category: 'validation',
      context: {
        operation: 'theme:resolve',
        component: 'ThemeResolver',
        metadata: { path: options.path, origin: options.origin },
      },
      isOperational: true,
    })
    this.name = 'ValueShapeError'
    this.path = options.path
    this.value = options.value
  }
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E = AppError> =
  | { success: true; data: T }
  | { success: false; error: E }

/**
 * Helper to create success result
 */
export function ok<T>(data: T): Result<T> {
  return { success: true, data }
}

/**
 * Helper to create error result
 */
export function err<E extends AppError>(error: E): Result<never, E> {
  return { success: false, error }
}

/**
 * Extract error message safely
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'An unknown error occurred'
}
