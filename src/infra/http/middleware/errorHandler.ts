import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  AccountInactiveError,
  AuthError,
  InvalidEmailError,
  RegistrationConflictError,
  WeakPasswordError,
} from '../../../domain/auth/errors.js';
import {
  ForbiddenError,
  NotFoundError,
  StorageUnavailableError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { logger as rootLogger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

const logger = rootLogger.child({ component: 'http' });

function send(res: Response, status: number, response: ErrorResponse): void {
  res.status(status).json(response);
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  // Registration input problems carry enough detail to fix the request
  if (err instanceof WeakPasswordError) {
    send(res, 400, {
      code: 'WEAK_PASSWORD',
      message: err.message,
      details: { rule: err.rule, reason: err.reason },
    });
    return;
  }

  if (err instanceof InvalidEmailError) {
    send(res, 400, { code: 'INVALID_EMAIL', message: err.message });
    return;
  }

  if (err instanceof RegistrationConflictError) {
    send(res, 409, { code: err.code, message: err.message, details: { field: err.field } });
    return;
  }

  // Only reachable with the right password, so the state is not an oracle
  if (err instanceof AccountInactiveError) {
    send(res, 403, { code: 'ACCOUNT_INACTIVE', message: err.message });
    return;
  }

  // Every other authentication failure looks the same from outside
  if (err instanceof AuthError) {
    logger.warn({ reason: err.code, path: req.path }, 'Authentication failed');
    send(res, 401, { code: 'UNAUTHORIZED', message: 'Unauthorized' });
    return;
  }

  if (err instanceof UnauthorizedError) {
    send(res, 401, { code: 'UNAUTHORIZED', message: err.message });
    return;
  }

  if (err instanceof ForbiddenError) {
    send(res, 403, { code: 'FORBIDDEN', message: err.message });
    return;
  }

  if (err instanceof NotFoundError) {
    send(res, 404, { code: 'NOT_FOUND', message: err.message });
    return;
  }

  if (err instanceof StorageUnavailableError) {
    logger.error({ operation: err.operation, err: err.cause }, 'Storage unavailable');
    send(res, 503, { code: 'STORAGE_UNAVAILABLE', message: 'Service temporarily unavailable' });
    return;
  }

  // Malformed JSON bodies from express.json()
  if ('type' in err && err.type === 'entity.parse.failed') {
    send(res, 400, { code: 'INVALID_JSON', message: 'Malformed JSON body' });
    return;
  }

  logger.error({ err, path: req.path }, 'Unhandled error');
  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
