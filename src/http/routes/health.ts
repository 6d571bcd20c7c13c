import { Router, Request, Response } from 'express';
import type { HealthStatus } from '../../types/schemas.js';
import { methodNotAllowed } from '../middleware.js';

/**
 * GET /health
 *
 * Liveness probe. Answers the same body whatever the store holds, so
 * monitors and `healthcheck` can rely on it.
 */
export function healthRouter(): Router {
  const router = Router({ caseSensitive: true });

  router
    .route('/')
    .get((_req: Request, res: Response) => {
      const body: HealthStatus = { status: 'ok' };
      res.json(body);
    })
    .all(methodNotAllowed('GET'));

  return router;
}
