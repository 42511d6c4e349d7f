// middleware/requestId.middleware.ts — Assigns a unique request ID for tracing

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const INCOMING_ID = /^[\w.:-]{1,64}$/;

/**
 * Assigns a unique request ID to every incoming request.
 * A well-formed X-Request-ID header (e.g. from a reverse proxy) is reused.
 * The ID is echoed in the response header and ends up in the activity log.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers['x-request-id'];
  const requestId =
    typeof incoming === 'string' && INCOMING_ID.test(incoming) ? incoming : `req_${uuidv4().slice(0, 8)}`;
  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  next();
}
