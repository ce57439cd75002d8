/**
 * Centralized error handling utilities
 *
 * The composer and the section assembler never throw. Errors only arise at the
 * edges: reading a descriptor manifest, validating its shape, and reading
 * configuration.
 */

import type { Logger } from './logger.js';

// ══════════════════════════════════════════════════════════════════════════════
// ERROR TYPES
// ══════════════════════════════════════════════════════════════════════════════

export type ErrorDetails = Record<string, unknown>;

export class UiDocsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: ErrorDetails,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'UiDocsError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ValidationError extends UiDocsError {
  constructor(message: string, details?: ErrorDetails, suggestion?: string) {
    super(message, 'VALIDATION_ERROR', details, suggestion);
    this.name = 'ValidationError';
  }
}

export class FileSystemError extends UiDocsError {
  constructor(message: string, details?: ErrorDetails, suggestion?: string) {
    super(message, 'FILE_SYSTEM_ERROR', details, suggestion);
    this.name = 'FileSystemError';
  }
}

export class ConfigurationError extends UiDocsError {
  constructor(message: string, details?: ErrorDetails, suggestion?: string) {
    super(message, 'CONFIGURATION_ERROR', details, suggestion);
    this.name = 'ConfigurationError';
  }
}

// ══════════════════════════════════════════════════════════════════════════════
// ERROR UTILITIES
// ══════════════════════════════════════════════════════════════════════════════

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

/**
 * Node.js system errors carry a string `code` such as ENOENT
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Message, then `Suggestion:` and optionally the stack, each on its own line
 */
export function formatErrorMessage(
  error: unknown,
  options: { includeStack?: boolean; context?: string } = {}
): string {
  const head = options.context
    ? `${options.context}: ${getErrorMessage(error)}`
    : getErrorMessage(error);
  const lines = [head];

  if (error instanceof UiDocsError && error.suggestion) {
    lines.push(`Suggestion: ${error.suggestion}`);
  }
  if (options.includeStack && error instanceof Error && error.stack) {
    lines.push(`Stack trace:\n${error.stack}`);
  }
  return lines.join('\n');
}

const FILE_SYSTEM_FAILURES: Record<string, { label: string; suggestion: string }> = {
  ENOENT: {
    label: 'File not found',
    suggestion: 'Pass --catalog <file> or set UIDOCS_CATALOG to a descriptor manifest',
  },
  EACCES: { label: 'Permission denied', suggestion: 'Check file permissions' },
  EPERM: { label: 'Operation not permitted', suggestion: 'Check file permissions' },
};

/**
 * Convert a thrown value to a UiDocsError, mapping common file system codes
 */
export function wrapError(error: unknown, context?: string, suggestion?: string): UiDocsError {
  if (error instanceof UiDocsError) {
    return error;
  }

  const message = context ? `${context}: ${getErrorMessage(error)}` : getErrorMessage(error);

  if (!isNodeError(error)) {
    return new UiDocsError(message, 'UNKNOWN_ERROR', undefined, suggestion);
  }

  const known = error.code ? FILE_SYSTEM_FAILURES[error.code] : undefined;
  if (known && error.path) {
    const where = context ? `${error.path} (${context})` : error.path;
    return new FileSystemError(
      `${known.label}: ${where}`,
      { code: error.code, path: error.path },
      suggestion ?? known.suggestion
    );
  }
  return new FileSystemError(message, { code: error.code, path: error.path }, suggestion);
}

// ══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER
// ══════════════════════════════════════════════════════════════════════════════

export interface ErrorHandlerOptions {
  logger?: Logger;
  exitOnError?: boolean;
  showStack?: boolean;
}

/**
 * Report an error through the logger, or stderr without one, and optionally exit
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): void {
  const { logger, exitOnError = false, showStack = process.env.DEBUG === 'true' } = options;
  const message = formatErrorMessage(error, { includeStack: showStack });
  const details = error instanceof UiDocsError ? error.details : undefined;

  if (logger) {
    logger.error(message);
    if (details) {
      logger.debug('Error details', details);
    }
  } else {
    console.error(`❌ ${message}`);
    if (details && showStack) {
      console.error('Error details:', details);
    }
  }

  if (exitOnError) {
    process.exit(1);
  }
}

export async function tryAsync<T>(
  fn: () => Promise<T>,
  context?: string,
  suggestion?: string
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw wrapError(error, context, suggestion);
  }
}
