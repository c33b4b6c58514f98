import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Principal, Role } from '../../../domain/auth/user.js';
import type { AccessControl, Credential } from '../../../application/auth/accessControl.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { asyncHandler } from './asyncHandler.js';

export interface AuthRequest extends Request {
  principal?: Principal;
  credential?: Credential;
}

export const API_KEY_HEADER = 'x-api-key';

/**
 * Read the credential from `Authorization: Bearer` or `X-API-Key`.
 * Exactly one of the two must be present.
 */
export function extractCredential(req: Request): Credential {
  const authHeader = req.headers.authorization;
  const apiKeyHeader = req.headers[API_KEY_HEADER];

  if (authHeader !== undefined && apiKeyHeader !== undefined) {
    throw new UnauthorizedError('Provide either a bearer token or an API key, not both');
  }

  if (authHeader !== undefined) {
    const match = /^Bearer\s+(\S+)$/i.exec(authHeader.trim());
    if (!match) {
      throw new UnauthorizedError('Missing or invalid authorization header');
    }
    return { kind: 'bearer', token: match[1] };
  }

  if (typeof apiKeyHeader === 'string' && apiKeyHeader.length > 0) {
    return { kind: 'apiKey', key: apiKeyHeader };
  }

  throw new UnauthorizedError('Missing credentials');
}

export function principalOf(req: AuthRequest): Principal {
  if (!req.principal) {
    throw new UnauthorizedError();
  }
  return req.principal;
}

export function authMiddleware(accessControl: AccessControl): RequestHandler {
  return asyncHandler(async (req: AuthRequest, _res: Response, next: NextFunction) => {
    const credential = extractCredential(req);
    req.principal = await accessControl.authenticate(credential);
    req.credential = credential;
    next();
  });
}

export function requireRole(accessControl: AccessControl, role: Role): RequestHandler {
  return (req: AuthRequest, _res, next) => {
    try {
      accessControl.requireRole(principalOf(req), role);
      next();
    } catch (error) {
      next(error);
    }
  };
}
