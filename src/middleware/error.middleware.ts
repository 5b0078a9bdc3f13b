import type { Request, Response, NextFunction } from 'express';
import { loggers } from '../utils/logger';
import { HttpStatus } from '../types/api.types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR,
    isOperational: boolean = true,
    details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.BAD_REQUEST, true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, HttpStatus.NOT_FOUND, true);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR, false, details);
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(service: string, message: string, details?: unknown) {
    super(`${service}: ${message}`, HttpStatus.BAD_GATEWAY, true, details);
    this.service = service;
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR, true, details);
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error occurred';
};

const getErrorStatusCode = (error: unknown): number => {
  if (error instanceof AppError) return error.statusCode;
  if (typeof error === 'object' && error !== null) {
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    if ('status' in error && typeof error.status === 'number') return error.status;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
};

interface ErrorResponseBody {
  success: false;
  error: {
    message: string;
    statusCode: number;
    timestamp: string;
    path: string;
    details?: unknown;
    stack?: string;
  };
}

export interface ErrorHandlerOptions {
  /** Include stack traces in error bodies (DEBUG outside production) */
  exposeStack: boolean;
}

export const createErrorHandler = ({ exposeStack }: ErrorHandlerOptions) => (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const statusCode = getErrorStatusCode(err);
  const message = getErrorMessage(err);
  const isOperational = err instanceof AppError ? err.isOperational : statusCode < 500;

  const errorLog = {
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    requestId: req.requestId,
    statusCode,
    message,
    stack: err instanceof Error ? err.stack : undefined,
  };

  if (statusCode >= 500) {
    loggers.api.error('Server Error', errorLog);
  } else {
    loggers.api.warn('Client Error', errorLog);
  }

  if (res.headersSent) {
    return next(err);
  }

  const responseBody: ErrorResponseBody = {
    success: false,
    error: {
      message: isOperational ? message : 'Internal server error',
      statusCode,
      timestamp: new Date().toISOString(),
      path: req.originalUrl,
    },
  };

  if (err instanceof AppError && err.details !== undefined && isOperational) {
    responseBody.error.details = err.details;
  }

  if (exposeStack && err instanceof Error) {
    responseBody.error.stack = err.stack;
  }

  res.status(statusCode).json(responseBody);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  const error = new NotFoundError(`Route ${req.originalUrl} not found`);

  loggers.api.warn('404 Not Found', {
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
  });

  res.status(HttpStatus.NOT_FOUND).json({
    success: false,
    error: {
      message: error.message,
      statusCode: HttpStatus.NOT_FOUND,
      timestamp: new Date().toISOString(),
      path: req.originalUrl,
    },
  });
};

export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
