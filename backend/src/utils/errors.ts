/**
 * Error classes for the custody tracker.
 *
 * Each error carries:
 *  - code: machine-readable error code (used in API responses)
 *  - statusCode: HTTP status code to return
 *  - category: the custody error taxonomy bucket the code belongs to
 *  - message: human-readable description
 *
 * Service operations return these inside a Result; only the HTTP layer
 * passes them on to Express via next(err).
 */

export type ErrorCategory =
  | 'NotFound'
  | 'Forbidden'
  | 'InvalidState'
  | 'InvalidInput'
  | 'ConcurrencyConflict'
  | 'StorageFailure'
  | 'Unauthenticated';

/**
 * Base application error class.
 * All custom errors extend this for consistent error handling.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly category: ErrorCategory;
  public readonly details: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    code: string,
    statusCode: number,
    category: ErrorCategory,
    message: string,
    details: Record<string, unknown> = {},
    isOperational = true
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.category = category;
    this.details = details;
    this.isOperational = isOperational;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================
// Authentication Errors
// ============================================

/**
 * Authentication error (401).
 * Covers missing, malformed and expired tokens.
 */
export class AuthError extends AppError {
  constructor(message: string = 'Authentication failed', code: string = 'AUTH_TOKEN_INVALID') {
    super(code, 401, 'Unauthenticated', message);
    this.name = 'AuthError';
  }
}

// ============================================
// Not Found
// ============================================

export class DocumentNotFoundError extends AppError {
  constructor(kind: string, documentId: number) {
    super('DOCUMENT_NOT_FOUND', 404, 'NotFound', `${kind} '${documentId}' not found.`, { kind, documentId });
    this.name = 'DocumentNotFoundError';
  }
}

export class UserNotFoundError extends AppError {
  constructor(userId: number) {
    super('USER_NOT_FOUND', 404, 'NotFound', `User '${userId}' not found.`, { userId });
    this.name = 'UserNotFoundError';
  }
}

/**
 * Generic not found error (404), used for unmatched routes.
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super('NOT_FOUND', 404, 'NotFound', `${resource} '${id}' not found.`, { resource, id });
    this.name = 'NotFoundError';
  }
}

// ============================================
// Forbidden
// ============================================

/**
 * The actor matched none of the forwarding cases for this document.
 */
export class CustodyForbiddenError extends AppError {
  constructor(documentId: number, actorId: number, action: string) {
    super(
      'CUSTODY_FORBIDDEN',
      403,
      'Forbidden',
      `User '${actorId}' is not permitted to ${action} document '${documentId}'.`,
      { documentId, actorId, action }
    );
    this.name = 'CustodyForbiddenError';
  }
}

/**
 * The actor may forward, but not to the chosen recipient.
 */
export class RecipientNotAllowedError extends AppError {
  constructor(documentId: number, recipientId: number) {
    super(
      'RECIPIENT_NOT_ALLOWED',
      403,
      'Forbidden',
      `User '${recipientId}' is not a valid recipient for document '${documentId}'.`,
      { documentId, recipientId }
    );
    this.name = 'RecipientNotAllowedError';
  }
}

export class InsufficientRoleError extends AppError {
  constructor(actorId: number, requiredCapability: string) {
    super(
      'AUTH_INSUFFICIENT_ROLE',
      403,
      'Forbidden',
      `User '${actorId}' lacks the '${requiredCapability}' capability.`,
      { actorId, requiredCapability }
    );
    this.name = 'InsufficientRoleError';
  }
}

// ============================================
// Invalid State
// ============================================

/**
 * Terminal statuses freeze custody permanently.
 */
export class TerminalStateError extends AppError {
  constructor(documentId: number, status: string) {
    super(
      'DOCUMENT_TERMINAL_STATE',
      409,
      'InvalidState',
      `Document '${documentId}' is in terminal status '${status}' and its custody is frozen.`,
      { documentId, status }
    );
    this.name = 'TerminalStateError';
  }
}

export class DocumentParkedError extends AppError {
  constructor(documentId: number) {
    super('DOCUMENT_PARKED', 409, 'InvalidState', `Document '${documentId}' is parked. Unpark it first.`, {
      documentId,
    });
    this.name = 'DocumentParkedError';
  }
}

export class DocumentNotParkedError extends AppError {
  constructor(documentId: number) {
    super('DOCUMENT_NOT_PARKED', 409, 'InvalidState', `Document '${documentId}' is not parked.`, { documentId });
    this.name = 'DocumentNotParkedError';
  }
}

export class LedgerStateError extends AppError {
  constructor(code: 'LEDGER_ALREADY_INITIALIZED' | 'LEDGER_NOT_INITIALIZED', documentId: number) {
    super(
      code,
      409,
      'InvalidState',
      code === 'LEDGER_ALREADY_INITIALIZED'
        ? `Document '${documentId}' has already been received.`
        : `Document '${documentId}' has no current ledger entry.`,
      { documentId }
    );
    this.name = 'LedgerStateError';
  }
}

// ============================================
// Invalid Input
// ============================================

export class InvalidDateError extends AppError {
  constructor(value: string, reason: 'unparsable' | 'future' | 'before_receipt') {
    const messages = {
      unparsable: `Date '${value}' could not be parsed. Use YYYY-MM-DD or an ISO-8601 timestamp.`,
      future: `Date '${value}' lies in the future.`,
      before_receipt: `Date '${value}' is earlier than the document's receive date.`,
    };
    super('INVALID_DATE', 400, 'InvalidInput', messages[reason], { value, reason });
    this.name = 'InvalidDateError';
  }
}

export class MissingRecipientError extends AppError {
  constructor() {
    super('MISSING_RECIPIENT', 400, 'InvalidInput', 'A recipient (toUserId) is required to forward a document.');
    this.name = 'MissingRecipientError';
  }
}

export class InvalidStatusError extends AppError {
  constructor(kind: string, status: string, allowed: readonly string[]) {
    super('INVALID_STATUS', 400, 'InvalidInput', `Status '${status}' is not valid for ${kind}.`, {
      kind,
      status,
      allowed: [...allowed],
    });
    this.name = 'InvalidStatusError';
  }
}

export class DuplicateDocumentNumberError extends AppError {
  constructor(kind: string, documentNumber: string) {
    super(
      'DUPLICATE_DOCUMENT_NUMBER',
      409,
      'InvalidInput',
      `A ${kind} numbered '${documentNumber}' already exists.`,
      { kind, documentNumber }
    );
    this.name = 'DuplicateDocumentNumberError';
  }
}

/**
 * Validation error (400).
 * Wraps Zod validation failures.
 */
export class ValidationError extends AppError {
  public readonly validationErrors: Record<string, string[]>;

  constructor(message: string, validationErrors: Record<string, string[]> = {}) {
    super('VALIDATION_ERROR', 400, 'InvalidInput', message, { validationErrors });
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;
  }
}

// ============================================
// Concurrency & Storage
// ============================================

/**
 * The ledger head moved between the policy check and the commit.
 */
export class ConcurrencyConflictError extends AppError {
  constructor(documentId: number, expectedMovementId: number) {
    super(
      'CUSTODY_CONFLICT',
      409,
      'ConcurrencyConflict',
      `Custody of document '${documentId}' changed while this request was being processed. Reload and retry.`,
      { documentId, expectedMovementId }
    );
    this.name = 'ConcurrencyConflictError';
  }
}

export class StorageFailureError extends AppError {
  constructor(operation: string, cause?: unknown) {
    super(
      'STORAGE_FAILURE',
      500,
      'StorageFailure',
      `Storage failure during ${operation}.`,
      { operation, cause: cause instanceof Error ? cause.message : String(cause) },
      false
    );
    this.name = 'StorageFailureError';
  }
}
