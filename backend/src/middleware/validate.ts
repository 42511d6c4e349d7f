import type { Request } from 'express';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { createServiceLogger } from '../config/logger.js';
import { ValidationError } from '../utils/errors.js';

const log = createServiceLogger('validation');

type RequestPart = 'body' | 'query' | 'params';

/**
 * Flatten a ZodError into the `{ field: messages[] }` map returned to clients.
 * Form-level errors are reported under `_form`.
 */
export function toValidationError(zodError: ZodError): ValidationError {
  const flattened = zodError.flatten();
  const validationErrors: Record<string, string[]> = {};
  const fieldMessages: string[] = [];

  for (const [field, errors] of Object.entries(flattened.fieldErrors)) {
    if (errors && errors.length > 0) {
      validationErrors[field] = errors;
      fieldMessages.push(`${field}: ${errors.join(', ')}`);
    }
  }
  if (flattened.formErrors.length > 0) {
    validationErrors['_form'] = flattened.formErrors;
    fieldMessages.push(...flattened.formErrors);
  }

  const message =
    fieldMessages.length > 0 ? `Validation failed: ${fieldMessages.join('; ')}` : 'Request validation failed';

  return new ValidationError(message, validationErrors);
}

function parsePart<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: Request, part: RequestPart, value: unknown): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    log.debug(
      {
        path: req.path,
        method: req.method,
        part,
        errors: result.error.flatten(),
      },
      'Request validation failed'
    );
    throw toValidationError(result.error);
  }

  return result.data;
}

/**
 * Parse the request body, throwing a ValidationError on failure.
 *
 * Handlers call these inside their try block so the error reaches the error
 * handler through next(err) and the parsed value keeps its schema type.
 *
 * Usage:
 *   const input = parseBody(ForwardDocumentSchema, req);
 */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: Request, extra: Record<string, unknown> = {}): T {
  const body: unknown = req.body;
  const value = typeof body === 'object' && body !== null ? { ...body, ...extra } : { ...extra };
  return parsePart(schema, req, 'body', value);
}

/**
 * Query params from Express are always strings, so query schemas coerce.
 */
export function parseQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: Request): T {
  return parsePart(schema, req, 'query', req.query);
}

export function parseParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: Request): T {
  return parsePart(schema, req, 'params', req.params);
}
