import { Request, Response, NextFunction, RequestHandler } from 'express';
import { BaseError } from '../utils/errors';
import { Logger } from '../utils/Logger';

/**
 * Error Handling Middleware
 *
 * Centralized error handling following Express conventions
 * Maps custom errors to appropriate HTTP status codes
 */

const logger = new Logger('ErrorHandler');

export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    status: number;
    timestamp: string;
    path: string;
    details?: unknown;
    stack?: string;
  };
}

/**
 * Global error handler middleware
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response<ErrorResponse>,
  next: NextFunction
): void {
  // Don't handle if response was already sent
  if (res.headersSent) {
    return next(error);
  }

  let status = 500;
  let message = 'Internal Server Error';
  let type = 'InternalServerError';
  let details: unknown = undefined;

  if (error instanceof BaseError) {
    status = error.statusCode;
    type = error.name;
    details = error.details;
    message = !error.isOperational && process.env.NODE_ENV === 'production'
      ? 'Internal Server Error'
      : error.message;
  } else if (error.name === 'SyntaxError' && 'body' in error) {
    status = 400;
    message = 'Invalid JSON in request body';
    type = 'ValidationError';
  }

  if (status >= 500) {
    logger.error(`${req.method} ${req.path} failed: ${error.message}`, error.stack);
  } else {
    logger.warn(`${req.method} ${req.path} rejected (${status}): ${error.message}`);
  }

  const errorResponse: ErrorResponse = {
    error: {
      message,
      type,
      status,
      timestamp: new Date().toISOString(),
      path: req.path,
      details,
    },
  };

  // In development, include stack trace
  if (process.env.NODE_ENV === 'development') {
    errorResponse.error.stack = error.stack;
  }

  res.status(status).json(errorResponse);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(
  req: Request,
  res: Response<ErrorResponse>
): void {
  const errorResponse: ErrorResponse = {
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      type: 'NotFoundError',
      status: 404,
      timestamp: new Date().toISOString(),
      path: req.path,
    },
  };

  res.status(404).json(errorResponse);
}

/**
 * Async error wrapper for route handlers
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
