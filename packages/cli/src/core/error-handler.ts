/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { logger } from '@adprep/utils';

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /private[_-]?key/i,
  /bearer/i,
  /authorization/i,
];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }

  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errnoPath(error: unknown): string {
  if (error instanceof Error && 'path' in error && typeof error.path === 'string') {
    return error.path;
  }
  return 'target';
}

/**
 * Translate filesystem errors raised while linking into actionable messages
 */
export function handleFilesystemError(error: unknown): string {
  switch (errnoCode(error)) {
    case 'EACCES':
    case 'EPERM':
      return `Permission denied: ${errnoPath(error)}. Check directory permissions or use --link-mode copy.`;
    case 'EXDEV':
      return 'Hard links cannot cross filesystems. Use --link-mode symlink or copy.';
    case 'ENOSPC':
      return `No space left on device while writing ${errnoPath(error)}.`;
    case 'EEXIST':
      return `Path already exists: ${errnoPath(error)}.`;
    default:
      return formatError(error);
  }
}

/**
 * Log error with full context (for debugging)
 * This should include full error details, but never expose secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  if (error instanceof Error) {
    logger.error('CLI error', error, { context: sanitizedContext });
  } else {
    logger.error('CLI error', undefined, {
      error: String(error),
      context: sanitizedContext,
    });
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return handleFilesystemError(error);
}
