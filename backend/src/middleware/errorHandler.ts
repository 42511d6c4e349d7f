import type { Request, Response, NextFunction } from 'express';
import { createServiceLogger } from '../config/logger.js';
import { AppError, NotFoundError } from '../utils/errors.js';
import type { ErrorResponse } from '../types/index.js';

const log = createServiceLogger('error-handler');

/**
 * Fallback map of error codes to HTTP status codes, for errors that carry a
 * code but no status of their own.
 */
const ERROR_CODE_TO_STATUS: Record<string, number> = {
  // Auth
  AUTH_TOKEN_INVALID: 401,
  AUTH_TOKEN_EXPIRED: 401,
  AUTH_INSUFFICIENT_ROLE: 403,

  // Not found
  DOCUMENT_NOT_FOUND: 404,
  USER_NOT_FOUND: 404,
  NOT_FOUND: 404,

  // Custody policy
  CUSTODY_FORBIDDEN: 403,
  RECIPIENT_NOT_ALLOWED: 403,

  // Document state
  DOCUMENT_TERMINAL_STATE: 409,
  DOCUMENT_PARKED: 409,
  DOCUMENT_NOT_PARKED: 409,
  LEDGER_ALREADY_INITIALIZED: 409,
  LEDGER_NOT_INITIALIZED: 409,
  CUSTODY_CONFLICT: 409,

  // Input
  INVALID_DATE: 400,
  MISSING_RECIPIENT: 400,
  INVALID_STATUS: 400,
  DUPLICATE_DOCUMENT_NUMBER: 409,
  VALIDATION_ERROR: 400,

  // Internal
  STORAGE_FAILURE: 500,
  INTERNAL_ERROR: 500,
};

/** The optional fields third-party errors (body-parser, http-errors) may carry. */
interface ErrorShape {
  code?: unknown;
  statusCode?: unknown;
  status?: unknown;
}

function isHttpStatus(value: unknown): value is number {
  return typeof value === 'number' && value >= 400 && value < 600;
}

/**
 * Resolve the HTTP status code for an error.
 */
function resolveStatusCode(err: Error & ErrorShape): number {
  if (isHttpStatus(err.statusCode)) {
    return err.statusCode;
  }

  if (typeof err.code === 'string') {
    const mapped = ERROR_CODE_TO_STATUS[err.code];
    if (mapped !== undefined) {
      return mapped;
    }
  }

  if (isHttpStatus(err.status)) {
    return err.status;
  }

  return 500;
}

function resolveErrorCode(err: Error & ErrorShape, statusCode: number): string {
  if (err instanceof AppError) {
    return err.code;
  }

  switch (statusCode) {
    case 400:
      return 'BAD_REQUEST';
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    default:
      return 'INTERNAL_ERROR';
  }
}

/**
 * Build the error details object. In production, 5xx details (storage and
 * driver causes included) stay in the log; stack traces only leave the
 * process outside production.
 */
function buildDetails(err: Error, statusCode: number): Record<string, unknown> {
  const details: Record<string, unknown> = {};

  if (process.env['NODE_ENV'] === 'production' && statusCode >= 500) {
    return details;
  }

  if (err instanceof AppError) {
    Object.assign(details, err.details);
  }

  if (process.env['NODE_ENV'] !== 'production' && statusCode >= 500) {
    details['stack'] = err.stack;
  }

  return details;
}

/**
 * Global error handler middleware. Register LAST.
 *
 * {
 *   "success": false,
 *   "error": {
 *     "code": "CUSTODY_FORBIDDEN",
 *     "message": "User '7' is not permitted to forward document '12'.",
 *     "details": { "documentId": 12, "actorId": 7, "action": "forward" },
 *     "requestId": "req_7f3a8b2c",
 *     "timestamp": "2026-03-15T10:30:00.000Z"
 *   }
 * }
 *
 * In production, 5xx messages are replaced with a generic message.
 */
export function errorHandler(err: Error & ErrorShape, req: Request, res: Response, _next: NextFunction): void {
  if (res.headersSent) {
    log.error({ err }, 'Error after headers sent, cannot respond');
    return;
  }

  const statusCode = resolveStatusCode(err);
  const errorCode = resolveErrorCode(err, statusCode);
  const details = buildDetails(err, statusCode);

  let message: string;
  if (statusCode >= 500 && process.env['NODE_ENV'] === 'production') {
    message = 'An internal error occurred. Please try again later.';
  } else {
    message = err.message || 'An unexpected error occurred.';
  }

  if (statusCode >= 500) {
    log.error(
      {
        err,
        requestId: req.requestId,
        method: req.method,
        path: req.path,
        statusCode,
        errorCode,
      },
      'Server error'
    );
  } else {
    log.warn(
      {
        requestId: req.requestId,
        method: req.method,
        path: req.path,
        statusCode,
        errorCode,
        message: err.message,
      },
      'Client error'
    );
  }

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      details,
      requestId: req.requestId ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };

  res.status(statusCode).json(response);
}

/**
 * 404 handler for undefined routes.
 * Register this AFTER all route definitions but BEFORE the error handler.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
