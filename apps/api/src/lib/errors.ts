import type { FastifyError } from 'fastify';
import { ZodError } from 'zod';

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 400,
    public readonly details?: Record<string, unknown>,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

// Domain errors raised by the award pipeline and attempt lifecycle
export class NotFoundError extends AppError {
  constructor(
    public readonly resource: string,
    id?: string
  ) {
    super(
      'NOT_FOUND',
      id ? `${resource} with id '${id}' not found` : `${resource} not found`,
      404
    );
    this.name = 'NotFoundError';
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_STATE', message, 409, details);
    this.name = 'InvalidStateError';
  }
}

/**
 * A store (database or rank cache) failed in a way worth retrying.
 * The dispatcher retries these with backoff before dead-lettering.
 */
export class TransientStoreFailureError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(
      'TRANSIENT_STORE_FAILURE',
      message,
      503,
      cause instanceof Error ? { cause: cause.message } : undefined,
      true
    );
    this.name = 'TransientStoreFailureError';
  }
}

// Boundary errors
export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('UNAUTHORIZED', message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Access denied') {
    super('FORBIDDEN', message, 403);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('CONFLICT', message, 409);
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AppError ? error.retryable : true;
}

// Error body for Fastify
export function formatError(error: FastifyError | AppError | Error) {
  if (error instanceof AppError) {
    return error.toJSON();
  }

  // Handle Fastify validation errors
  if ('validation' in error && error.validation) {
    return {
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: {
          issues: error.validation,
        },
      },
    };
  }

  if (error instanceof ZodError) {
    return {
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: {
          issues: error.issues,
        },
      },
    };
  }

  // Generic error
  return {
    error: {
      code: 'INTERNAL_ERROR',
      message:
        process.env.NODE_ENV === 'production'
          ? 'An unexpected error occurred'
          : error.message,
    },
  };
}
