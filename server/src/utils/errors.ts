import { Request, Response, NextFunction } from 'express';
import type { ConfigIssue } from '../config/types';
import logger from './logger';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request - validation errors
 */
export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400);
    this.field = field;
  }
}

/**
 * 404 Not Found - resource not found
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string) {
    super(`${resource} not found`, 404);
    this.resource = resource;
  }
}

/**
 * 409 Conflict - duplicate or already exists
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * A configuration document failed structural or semantic validation.
 * Carries every error-level issue so the operator can locate the entry.
 */
export class ConfigValidationError extends AppError {
  public readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[], source?: string) {
    const where = source ? ` (${source})` : '';
    const summary = issues
      .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Invalid configuration${where}: ${summary}`, 422);
    this.issues = issues;
  }
}

export class DuplicateServiceError extends ConflictError {
  public readonly serviceName: string;

  constructor(serviceName: string) {
    super(`Service "${serviceName}" is already scheduled`);
    this.serviceName = serviceName;
  }
}

export class ServiceNotScheduledError extends NotFoundError {
  public readonly serviceName: string;

  constructor(serviceName: string) {
    super(`Scheduled service "${serviceName}"`);
    this.serviceName = serviceName;
  }
}

export class ProbeInProgressError extends ConflictError {
  constructor(serviceName: string) {
    super(`A probe for "${serviceName}" is already in flight`);
  }
}

/**
 * Standard error response shape
 */
export interface ErrorResponse {
  error: string;
  field?: string;
  issues?: ConfigIssue[];
}

/**
 * Format an error for JSON response.
 * AppError messages are operational and safe to return; anything else
 * gets a generic message.
 */
export function formatError(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      error: error.message,
      ...(error.field && { field: error.field }),
    };
  }

  if (error instanceof ConfigValidationError) {
    return { error: 'Invalid configuration', issues: error.issues };
  }

  if (error instanceof AppError) {
    return { error: error.message };
  }

  return { error: 'Internal server error' };
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  return 500;
}

/**
 * Message of an unknown thrown value, as captured in outcomes and delivery records.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Express error handling middleware
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = getErrorStatusCode(error);

  if (statusCode >= 500) {
    logger.error({ err: error, method: req.method, path: req.path }, 'request failed');
  }

  res.status(statusCode).json(formatError(error));
}

/**
 * Async route handler wrapper that catches errors and forwards to error middleware
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
