/**
 * Custom Error Classes
 *
 * Single Responsibility: Define application-specific errors
 */

export class BaseError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number,
    isOperational = true,
    details?: unknown
  ) {
    super(message);

    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends BaseError {
  constructor(message: string, details?: string[]) {
    super(message, 400, true, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends BaseError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, true);
    this.name = 'NotFoundError';
  }
}

export class TooManyRequestsError extends BaseError {
  constructor(message: string = 'Too many requests') {
    super(message, 429, true);
    this.name = 'TooManyRequestsError';
  }
}

/**
 * Template slots are unordered, overlapping or malformed.
 * Raised before assembly starts; nothing is selected.
 */
export class InvalidTemplateError extends BaseError {
  constructor(message: string, details?: string[]) {
    super(message, 422, true, details);
    this.name = 'InvalidTemplateError';
  }
}

/**
 * Caller refused a partial playlist and at least one slot could not be filled.
 */
export class UnfillableSlotsError extends BaseError {
  constructor(message: string, details: unknown) {
    super(message, 422, true, details);
    this.name = 'UnfillableSlotsError';
  }
}

/**
 * The assembled playlist broke an ordering or accounting invariant.
 * Points at a bug in the selection or assembly code, never at user input.
 */
export class AssemblyInvariantViolationError extends BaseError {
  constructor(message: string, details?: string[]) {
    super(message, 500, false, details);
    this.name = 'AssemblyInvariantViolationError';
  }
}

export class InternalServerError extends BaseError {
  constructor(message: string = 'Internal server error', details?: unknown) {
    super(message, 500, false, details);
    this.name = 'InternalServerError';
  }
}

/**
 * Error handling utility functions
 */

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isFileNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
