/**
 * UI theme resolution service
 *
 * Layered lookup of interface colors and layout metrics: level overrides,
 * then the global settings document, then the built-in default table.
 */

export * from './services/theme'
export * from './services/config'
export {
  AppError,
  ThemeSourceError,
  ValueShapeError,
  ok,
  err,
  getErrorMessage,
  type ErrorSeverity,
  type ErrorCategory,
  type ErrorContext,
  type Result,
} from '../shared/errors'
