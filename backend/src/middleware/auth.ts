import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { AuthenticatedUser } from '../types/index.js';
import { AuthError } from '../utils/errors.js';
import { createServiceLogger } from '../config/logger.js';

const log = createServiceLogger('auth-middleware');

/**
 * Paths that do NOT require JWT authentication.
 */
const PUBLIC_PATHS: RegExp[] = [/^\/v1\/admin\/health$/, /^\/health$/];

/**
 * Claims this service relies on. Tokens are issued by the office identity
 * service; roles are NOT read from the token but from the user directory at
 * decision time.
 */
const AccessClaimsSchema = z.object({
  sub: z.string().regex(/^\d+$/, 'Subject must be a numeric user id'),
  name: z.string().optional(),
  type: z.enum(['access', 'refresh']),
});

export interface AuthOptions {
  /** PEM-encoded RSA public key. */
  publicKey: string;
  issuer: string;
}

function isPublicPath(requestPath: string): boolean {
  return PUBLIC_PATHS.some((pattern) => pattern.test(requestPath));
}

/**
 * Extract the Bearer token from the Authorization header.
 * Returns null if no valid Bearer token is found.
 */
function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers['authorization'];
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    return null;
  }

  return parts[1] ?? null;
}

/**
 * JWT authentication middleware factory.
 *
 * For protected routes:
 *  1. Extracts the Bearer token from the Authorization header
 *  2. Verifies it with RS256 against the configured public key and issuer
 *  3. Rejects refresh tokens
 *  4. Attaches the authenticated user to req.user
 */
export function authenticateJWT(options: AuthOptions): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (isPublicPath(req.path)) {
      next();
      return;
    }

    const token = extractBearerToken(req);

    if (!token) {
      next(new AuthError('Authentication required. Provide a valid Bearer token.'));
      return;
    }

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, options.publicKey, {
        algorithms: ['RS256'],
        issuer: options.issuer,
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        next(new AuthError('Access token has expired.', 'AUTH_TOKEN_EXPIRED'));
        return;
      }

      if (err instanceof jwt.JsonWebTokenError) {
        next(new AuthError('Invalid access token.'));
        return;
      }

      log.error({ err }, 'Unexpected JWT verification error');
      next(new AuthError('Authentication failed'));
      return;
    }

    const claims = AccessClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      next(new AuthError('Access token is missing required claims.'));
      return;
    }

    if (claims.data.type !== 'access') {
      next(new AuthError('Invalid token type. Use an access token, not a refresh token.'));
      return;
    }

    const user: AuthenticatedUser = {
      id: Number(claims.data.sub),
      name: claims.data.name ?? null,
    };
    req.user = user;

    log.debug({ userId: user.id, requestId: req.requestId }, 'User authenticated');
    next();
  };
}

/**
 * The authenticated user, for handlers mounted behind authenticateJWT.
 */
export function requireUser(req: Request): AuthenticatedUser {
  if (!req.user) {
    throw new AuthError('Authentication required. Provide a valid Bearer token.');
  }
  return req.user;
}
