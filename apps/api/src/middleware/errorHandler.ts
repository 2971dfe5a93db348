import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';

export class ServiceError extends Error {
  constructor(
    message: string,
    public service: string,
    public statusCode: number = 500,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'ServiceError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Rejected write. `field` names the input that failed so the caller can
 * attach the message to it.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public statusCode: number = 400,
    public field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConflictError extends Error {
  public statusCode = 409;

  constructor(message: string, public existingId?: number) {
    super(message);
    this.name = 'ConflictError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function fromZodError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
  return new ValidationError(issue?.message ?? 'Invalid request', 400, field);
}

/**
 * Errors that already carry an HTTP status pass through; anything else is
 * wrapped as a ServiceError for `service`.
 */
export function toHttpError(error: unknown, message: string, service: string): Error {
  if (
    error instanceof ServiceError ||
    error instanceof ValidationError ||
    error instanceof NotFoundError ||
    error instanceof ConflictError ||
    error instanceof ZodError
  ) {
    return error;
  }
  return new ServiceError(message, service, 500, error);
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ServiceError) {
    logger.error(
      `[${err.service}] ${err.message}`,
      err.originalError instanceof Error ? err.originalError : err.stack
    );

    res.status(err.statusCode).json({
      error: {
        message: err.message,
        service: err.service,
        code: err.statusCode,
      },
    });
    return;
  }

  if (err instanceof ZodError) {
    handleValidationError(fromZodError(err), res);
    return;
  }

  if (err instanceof ValidationError) {
    handleValidationError(err, res);
    return;
  }

  if (err instanceof NotFoundError) {
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        code: err.statusCode,
      },
    });
    return;
  }

  if (err instanceof ConflictError) {
    logger.warn(`Conflict: ${err.message}`);
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        code: err.statusCode,
        ...(err.existingId !== undefined && { existingId: err.existingId }),
      },
    });
    return;
  }

  // Unhandled errors
  logger.error(`Unhandled error on ${req.method} ${req.path}:`, err);

  res.status(500).json({
    error: {
      message:
        process.env.NODE_ENV === 'production'
          ? 'Internal server error'
          : err.message,
      code: 500,
    },
  });
}

function handleValidationError(err: ValidationError, res: Response): void {
  logger.warn(`Validation error${err.field ? ` on ${err.field}` : ''}: ${err.message}`);

  res.status(err.statusCode).json({
    error: {
      message: err.message,
      code: err.statusCode,
      ...(err.field && { field: err.field }),
    },
  });
}

export function notFoundHandler(
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.path} not found`,
      code: 404,
    },
  });
}
