/**
 * Structured error classes for MemVault
 * All errors are serializable and include metadata
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation error - invalid input data or configuration
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 422;
  readonly field?: string;
  readonly errors?: ReadonlyArray<{ path: string[]; message: string }>;

  constructor(
    message: string,
    options?: {
      field?: string;
      errors?: ReadonlyArray<{ path: string[]; message: string }>;
      cause?: unknown;
    }
  ) {
    super(message, options);
    this.field = options?.field;
    this.errors = options?.errors;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      errors: this.errors,
    };
  }
}

/**
 * Not found error - resource doesn't exist
 */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly statusCode = 404;
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string, options?: { cause?: unknown }) {
    super(`${resource} not found: ${id}`, options);
    this.resource = resource;
    this.id = id;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      resource: this.resource,
      id: this.id,
    };
  }
}

/**
 * Authentication error - missing or wrong API key
 */
export class AuthenticationError extends AppError {
  readonly code = 'AUTHENTICATION_ERROR' as const;
  readonly statusCode = 401;

  constructor(message: string = 'Invalid API key', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Crypto error - key loading or encryption failure
 */
export class CryptoError extends AppError {
  readonly code = 'CRYPTO_ERROR' as const;
  readonly statusCode = 500;
  readonly operation: 'encrypt' | 'load-key' | 'generate-key';

  constructor(
    operation: 'encrypt' | 'load-key' | 'generate-key',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Crypto ${operation} failed: ${message}`, options);
    this.operation = operation;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
    };
  }
}

/**
 * Decryption error - token is malformed, tampered with, or sealed under another key.
 * Bulk scans skip the row; a targeted read reports it as a server fault.
 */
export class DecryptionError extends AppError {
  readonly code = 'DECRYPTION_ERROR' as const;
  readonly statusCode = 500;
  readonly reason: 'malformed' | 'unsupported-version' | 'authentication';

  constructor(
    reason: 'malformed' | 'unsupported-version' | 'authentication',
    options?: { cause?: unknown }
  ) {
    super(`Decryption failed: ${reason}`, options);
    this.reason = reason;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
    };
  }
}

/**
 * Store unavailable error - the persistence layer cannot be reached
 */
export class StoreUnavailableError extends AppError {
  readonly code = 'STORE_UNAVAILABLE' as const;
  readonly statusCode = 503;

  constructor(message: string = 'Storage unavailable', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
