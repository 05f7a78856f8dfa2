/**
 * @fileoverview Logging exports
 */

export { HookLogger, createLogger, isLogLevel, type LogLevel, type LogContext } from './logger.js';

export { withLoggingContext, getLoggingContext, type LoggingContext } from './log-context.js';

export {
  LogErrorCategory,
  LogErrorCodes,
  categorizeError,
  type StructuredError,
  type LogErrorCode,
} from './error-codes.js';
