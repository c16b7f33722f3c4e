/**
 * Base error class for AppForge packages.
 * Carries a machine-readable code and optional details next to the message.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'BaseError';
    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid or missing configuration (env vars, config files)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input that fails validation
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Message text for anything thrown: Error message, the string itself, or String(value).
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
