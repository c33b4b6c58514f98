import { Request, Response, NextFunction } from 'express';
import { performance } from 'perf_hooks';
import type { UsageRecorder } from '../../../application/auth/usageRecorder.js';
import type { AuthRequest } from './auth.js';

function endpointOf(req: Request, mountedAt: { baseUrl: string; path: string }): string {
  const routePath: unknown = req.route?.path;
  return `${mountedAt.baseUrl}${typeof routePath === 'string' ? routePath : mountedAt.path}`;
}

/**
 * Record every authenticated call once its response has been sent.
 * Mount before the auth middleware; unauthenticated requests are skipped.
 */
export function usageMiddleware(recorder: UsageRecorder) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const started = performance.now();
    // Errors leave the router before the response is sent, which restores baseUrl and path
    const mountedAt = { baseUrl: req.baseUrl, path: req.path };
    res.on('finish', () => {
      if (req.principal) {
        recorder.record(
          req.principal.userId,
          endpointOf(req, mountedAt),
          res.statusCode,
          performance.now() - started
        );
      }
    });
    next();
  };
}
