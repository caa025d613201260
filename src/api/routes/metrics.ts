import { Router, type Request, type Response } from 'express';
import { renderMetrics } from '../../observability/metrics.js';

export function createMetricsRouter(): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.type('text/plain; version=0.0.4').send(renderMetrics());
  });

  return router;
}
