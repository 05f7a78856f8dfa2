/**
 * @fileoverview Error categorization for structured logging
 *
 * Standardized categories and codes for everything that can go wrong while
 * loading rules or running handlers. None of these are thrown across the
 * dispatcher boundary; they only shape log records.
 */

// =============================================================================
// Error Categories
// =============================================================================

export enum LogErrorCategory {
  FILESYSTEM = 'FS',
  NETWORK = 'NET',

  // Rule configuration
  HOOK_CONFIG = 'HCFG',

  // Handler execution
  HOOK_EXECUTION = 'HOOK',
  HOOK_OUTPUT = 'HOUT',

  // Completion backend used by prompt handlers
  PROMPT_BACKEND = 'PRMT',

  // Session environment
  SESSION_ENV = 'SENV',

  UNKNOWN = 'UNK',
}

// =============================================================================
// Structured Error Interface
// =============================================================================

export interface StructuredError {
  category: LogErrorCategory;
  /** Specific error code (e.g., 'HOOK_TIMEOUT', 'FS_NOT_FOUND') */
  code: LogErrorCode;
  message: string;
  context: Record<string, unknown>;
  /** Whether retrying may succeed */
  retryable: boolean;
  cause?: Error;
}

// =============================================================================
// Error Code Definitions
// =============================================================================

export const LogErrorCodes = {
  FS_NOT_FOUND: 'FS_NOT_FOUND',
  FS_PERMISSION: 'FS_PERMISSION',
  FS_READ: 'FS_READ',
  FS_WRITE: 'FS_WRITE',

  NET_TIMEOUT: 'NET_TIMEOUT',
  NET_REFUSED: 'NET_REFUSED',
  NET_RESET: 'NET_RESET',
  NET_DNS: 'NET_DNS',

  HCFG_PARSE: 'HCFG_PARSE',
  HCFG_INVALID: 'HCFG_INVALID',
  HCFG_MATCHER: 'HCFG_MATCHER',

  HOOK_SPAWN: 'HOOK_SPAWN',
  HOOK_TIMEOUT: 'HOOK_TIMEOUT',
  HOOK_CANCELLED: 'HOOK_CANCELLED',
  HOOK_ERROR: 'HOOK_ERROR',

  HOUT_MALFORMED: 'HOUT_MALFORMED',
  HOUT_SCHEMA: 'HOUT_SCHEMA',

  PRMT_AUTH: 'PRMT_AUTH',
  PRMT_RATE_LIMIT: 'PRMT_RATE_LIMIT',
  PRMT_API: 'PRMT_API',
  PRMT_UNAVAILABLE: 'PRMT_UNAVAILABLE',

  SENV_WRITE_REJECTED: 'SENV_WRITE_REJECTED',

  UNKNOWN: 'UNKNOWN',
} as const;

export type LogErrorCode = (typeof LogErrorCodes)[keyof typeof LogErrorCodes];

interface Classification {
  category: LogErrorCategory;
  code: LogErrorCode;
  retryable: boolean;
}

const HTTP_STATUS_CATEGORIES: Record<number, Classification> = {
  400: { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_API, retryable: false },
  401: { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_AUTH, retryable: false },
  403: { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_AUTH, retryable: false },
  408: { category: LogErrorCategory.NETWORK, code: LogErrorCodes.NET_TIMEOUT, retryable: true },
  429: { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_RATE_LIMIT, retryable: true },
  500: { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_API, retryable: true },
  502: { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_API, retryable: true },
  503: { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_UNAVAILABLE, retryable: true },
  529: { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_UNAVAILABLE, retryable: true },
};

const NODE_ERROR_CATEGORIES: Record<string, Classification> = {
  ENOENT: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_NOT_FOUND, retryable: false },
  EACCES: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_PERMISSION, retryable: false },
  EPERM: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_PERMISSION, retryable: false },
  EISDIR: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_READ, retryable: false },
  ENOTDIR: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_NOT_FOUND, retryable: false },
  ENOSPC: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_WRITE, retryable: false },
  ETIMEDOUT: { category: LogErrorCategory.NETWORK, code: LogErrorCodes.NET_TIMEOUT, retryable: true },
  ECONNREFUSED: { category: LogErrorCategory.NETWORK, code: LogErrorCodes.NET_REFUSED, retryable: true },
  ECONNRESET: { category: LogErrorCategory.NETWORK, code: LogErrorCodes.NET_RESET, retryable: true },
  ENOTFOUND: { category: LogErrorCategory.NETWORK, code: LogErrorCodes.NET_DNS, retryable: true },
};

// =============================================================================
// Error Categorization Function
// =============================================================================

/**
 * Categorize an error with structured metadata
 */
export function categorizeError(
  error: unknown,
  context?: Record<string, unknown>
): StructuredError {
  const err = error instanceof Error ? error : new Error(String(error));
  const baseContext = context ?? {};

  const status = readProperty(err, 'status') ?? readProperty(err, 'statusCode');
  if (typeof status === 'number' && HTTP_STATUS_CATEGORIES[status]) {
    return {
      ...HTTP_STATUS_CATEGORIES[status],
      message: err.message,
      context: { ...baseContext, status },
      cause: err,
    };
  }

  const nodeCode = readProperty(err, 'code');
  if (typeof nodeCode === 'string' && NODE_ERROR_CATEGORIES[nodeCode]) {
    return {
      ...NODE_ERROR_CATEGORIES[nodeCode],
      message: err.message,
      context: { ...baseContext, nodeCode },
      cause: err,
    };
  }

  const pattern = matchErrorPattern(err);
  if (pattern) {
    return {
      ...pattern,
      message: err.message,
      context: baseContext,
      cause: err,
    };
  }

  return {
    category: LogErrorCategory.UNKNOWN,
    code: LogErrorCodes.UNKNOWN,
    message: err.message,
    context: baseContext,
    retryable: false,
    cause: err,
  };
}

// =============================================================================
// Helper Functions
// =============================================================================

function readProperty(err: Error, key: string): unknown {
  return key in err ? Reflect.get(err, key) : undefined;
}

function matchErrorPattern(err: Error): Classification | undefined {
  const lowerMessage = err.message.toLowerCase();

  if (err.name === 'AbortError' || lowerMessage.includes('aborted')) {
    return { category: LogErrorCategory.HOOK_EXECUTION, code: LogErrorCodes.HOOK_CANCELLED, retryable: false };
  }

  if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
    return { category: LogErrorCategory.HOOK_EXECUTION, code: LogErrorCodes.HOOK_TIMEOUT, retryable: true };
  }

  if (err instanceof SyntaxError || lowerMessage.includes('json')) {
    return { category: LogErrorCategory.HOOK_OUTPUT, code: LogErrorCodes.HOUT_MALFORMED, retryable: false };
  }

  if (lowerMessage.includes('rate limit') || lowerMessage.includes('too many requests')) {
    return { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_RATE_LIMIT, retryable: true };
  }

  if (lowerMessage.includes('overloaded')) {
    return { category: LogErrorCategory.PROMPT_BACKEND, code: LogErrorCodes.PRMT_UNAVAILABLE, retryable: true };
  }

  return undefined;
}
