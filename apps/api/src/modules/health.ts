import { Router } from 'express';
import type { Request, Response } from 'express';
import { APP_NAME, APP_VERSION } from '@report-merge/shared';

export interface HealthOptions {
  /** Whether the default settings resolved when the service started. */
  configLoaded: () => boolean;
}

export function rootHandler(_req: Request, res: Response): void {
  res.json({
    message: `${APP_NAME} API`,
    status: 'running',
    timestamp: new Date().toISOString(),
  });
}

export function createHealthHandler(options: HealthOptions) {
  return (_req: Request, res: Response): void => {
    res.json({
      status: 'healthy',
      version: APP_VERSION,
      timestamp: new Date().toISOString(),
      config_loaded: options.configLoaded(),
    });
  };
}

export function createHealthRouter(options: HealthOptions): Router {
  const router = Router();
  router.get('/', rootHandler);
  router.get('/health', createHealthHandler(options));
  return router;
}
