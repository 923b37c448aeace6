import { Router } from 'express';
import type { Request, Response } from 'express';
import { serializeMetrics } from '@report-merge/merger';

/**
 * GET /metrics
 *
 * Merge counters and durations in Prometheus text exposition format.
 */
export function metricsHandler(_req: Request, res: Response): void {
  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(serializeMetrics());
}

export const metricsRouter = Router();

metricsRouter.get('/', metricsHandler);
