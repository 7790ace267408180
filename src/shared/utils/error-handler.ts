/**
 * Centralized Error Handler
 *
 * Standardized error types and classification for the subtitle track.
 *
 * Features:
 * - Error categorization by severity and type
 * - Dedicated classes for malformed input, render failures and broken
 *   cue-identity invariants
 * - Error context preservation
 * - Log-ready error information
 */

import { createLogger, type Logger } from './logger';

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error categories for classification
 */
export type ErrorCategory =
  | 'parse' // Subtitle parsing errors
  | 'render' // Renderer callback failures
  | 'invariant' // Internal consistency violations
  | 'validation' // Input/option validation errors
  | 'io' // File system errors
  | 'unknown'; // Unclassified errors

/**
 * Error severity levels
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Extended error information
 */
export interface ErrorInfo {
  code: string;
  message: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  context?: Record<string, unknown>;
  originalError?: Error;
  timestamp: string;
}

export interface AppErrorOptions {
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Application error class with extended info
 */
export class AppError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly context: Record<string, unknown>;
  readonly timestamp: string;

  constructor(code: string, message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.code = code;
    this.category = options.category ?? 'unknown';
    this.severity = options.severity ?? 'medium';
    this.context = options.context ?? {};
    this.timestamp = new Date().toISOString();
  }

  toInfo(): ErrorInfo {
    return {
      code: this.code,
      message: this.message,
      category: this.category,
      severity: this.severity,
      context: this.context,
      originalError: this.cause instanceof Error ? this.cause : undefined,
      timestamp: this.timestamp,
    };
  }
}

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Standard error codes used throughout the package
 */
export const ErrorCodes = {
  // Parse errors
  PARSE_INVALID_FORMAT: 'PARSE_INVALID_FORMAT',
  PARSE_INVALID_TIMESTAMP: 'PARSE_INVALID_TIMESTAMP',
  PARSE_EMPTY_CONTENT: 'PARSE_EMPTY_CONTENT',
  PARSE_INVALID_ENCODING: 'PARSE_INVALID_ENCODING',

  // Render errors
  RENDER_FAILED: 'RENDER_FAILED',
  RENDER_IN_PROGRESS: 'RENDER_IN_PROGRESS',

  // Invariant errors
  STYLE_LOOKUP_INCONSISTENCY: 'STYLE_LOOKUP_INCONSISTENCY',

  // Validation errors
  TIMELINE_EMPTY: 'TIMELINE_EMPTY',
  VALIDATION_INVALID_VALUE: 'VALIDATION_INVALID_VALUE',

  // File errors
  FILE_READ_ERROR: 'FILE_READ_ERROR',
  FILE_WRITE_ERROR: 'FILE_WRITE_ERROR',

  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Error Classes
// ============================================================================

/**
 * A subtitle file that cannot be turned into cues
 */
export class MalformedInputError extends AppError {
  readonly line?: number;

  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      line?: number;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(options.code ?? ErrorCodes.PARSE_INVALID_FORMAT, message, {
      category: 'parse',
      severity: 'medium',
      context: options.line !== undefined ? { ...options.context, line: options.line } : options.context,
      cause: options.cause,
    });
    this.name = 'MalformedInputError';
    this.line = options.line;
  }
}

/**
 * The renderer callback failed for a cue; the cue stays unrendered
 */
export class RenderFailureError extends AppError {
  constructor(
    message: string,
    options: {
      code?: typeof ErrorCodes.RENDER_FAILED | typeof ErrorCodes.RENDER_IN_PROGRESS;
      cause?: Error;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(options.code ?? ErrorCodes.RENDER_FAILED, message, {
      category: 'render',
      severity: 'high',
      context: options.context,
      cause: options.cause,
    });
    this.name = 'RenderFailureError';
  }
}

/**
 * A resolved cue has no entry in the style table of a styled session
 */
export class StyleLookupError extends AppError {
  constructor(cueKey: string) {
    super(
      ErrorCodes.STYLE_LOOKUP_INCONSISTENCY,
      `No word styles registered for cue ${cueKey}`,
      {
        category: 'invariant',
        severity: 'critical',
        context: { cueKey },
      }
    );
    this.name = 'StyleLookupError';
  }
}

// ============================================================================
// Error Handler Functions
// ============================================================================

/**
 * Classify an error based on its type and content
 */
export function classifyError(error: unknown): {
  category: ErrorCategory;
  severity: ErrorSeverity;
} {
  if (error instanceof AppError) {
    return { category: error.category, severity: error.severity };
  }

  if (error instanceof SyntaxError) {
    return { category: 'parse', severity: 'medium' };
  }

  if (error instanceof Error) {
    // Node system errors carry an errno code such as ENOENT
    if ('code' in error && typeof error.code === 'string' && /^E[A-Z]+$/.test(error.code)) {
      return { category: 'io', severity: 'high' };
    }

    const message = error.message.toLowerCase();
    if (message.includes('parse') || message.includes('invalid') || message.includes('format')) {
      return { category: 'parse', severity: 'medium' };
    }
  }

  return { category: 'unknown', severity: 'medium' };
}

/**
 * Create an AppError from any error type
 */
export function normalizeError(error: unknown, defaultCode: string = ErrorCodes.UNKNOWN_ERROR): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const classification = classifyError(error);
  const message = error instanceof Error ? error.message : String(error);

  return new AppError(defaultCode, message, {
    ...classification,
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Create an option/validation error
 */
export function createValidationError(
  message: string,
  context?: Record<string, unknown>
): AppError {
  return new AppError(ErrorCodes.VALIDATION_INVALID_VALUE, message, {
    category: 'validation',
    severity: 'medium',
    context,
  });
}

/**
 * Create a file system error
 */
export function createFileError(
  code: typeof ErrorCodes.FILE_READ_ERROR | typeof ErrorCodes.FILE_WRITE_ERROR,
  path: string,
  cause: unknown
): AppError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new AppError(code, `${code === ErrorCodes.FILE_READ_ERROR ? 'Cannot read' : 'Cannot write'} ${path}: ${reason}`, {
    category: 'io',
    severity: 'high',
    context: { path },
    cause: cause instanceof Error ? cause : undefined,
  });
}

// ============================================================================
// Error Logging
// ============================================================================

const defaultErrorLogger = createLogger('Error');

/**
 * Log an error with its code, category and context
 */
export function logError(error: unknown, logger: Logger = defaultErrorLogger): void {
  const info = normalizeError(error).toInfo();

  if (info.severity === 'low') {
    logger.warn(`[${info.code}] ${info.message}`, info.context);
    return;
  }

  logger.error(`[${info.code}] ${info.message}`, {
    category: info.category,
    severity: info.severity,
    ...info.context,
    ...(info.originalError ? { cause: info.originalError } : {}),
  });
}
