/**
 * Custom Error Classes
 * ====================
 * Standardized error classes shared by the workflows and the CLI.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: ErrorContext;

  constructor(message: string, code: string = 'APP_ERROR', context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - bad arguments or malformed metadata
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

/**
 * Not found error - for missing directories and files
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier ? `${resource} not found: ${identifier}` : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, identifier, ...context });
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
  }
}
