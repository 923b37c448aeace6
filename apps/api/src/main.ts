import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import helmet from 'helmet';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { pathToFileURL } from 'url';
import { APP_NAME, APP_VERSION, DEFAULT_API_HOST, DEFAULT_API_PORT } from '@report-merge/shared';
import { loadSettings, TemplateCache } from '@report-merge/merger';
import { logger } from './shared/logger';
import { errorHandler, NotFoundError } from './middleware/error-handler';
import { createHealthRouter } from './modules/health';
import { createMergeRouter, createMergeRunner } from './modules/merge/routes';
import type { MergeRunner } from './modules/merge/routes';
import { metricsRouter } from './modules/metrics/routes';

export interface AppOptions {
  /** Runs merges; defaults to the real pipeline with a shared template cache. */
  runner?: MergeRunner;
  configLoaded?: () => boolean;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const runner = options.runner ?? createMergeRunner({ templateCache: new TemplateCache(), logger });
  const healthRouter = createHealthRouter({ configLoaded: options.configLoaded ?? (() => false) });
  const mergeRouter = createMergeRouter(runner);

  // --- Global Middleware ---
  app.use(helmet());
  app.use(cors({
    origin: process.env.CORS_ORIGIN ?? false,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    maxAge: 86400,
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(pinoHttp({ logger }));

  // --- API Version Header ---
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-API-Version', APP_VERSION);
    next();
  });

  // --- Routes (v1 + unprefixed, same handlers) ---
  app.use('/api/v1', healthRouter);
  app.use('/api/v1/merge', mergeRouter);
  app.use('/api/v1/metrics', metricsRouter);

  app.use('/', healthRouter);
  app.use('/merge', mergeRouter);
  app.use('/metrics', metricsRouter);

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(req.method, req.path));
  });

  // --- Error Handler ---
  app.use(errorHandler);

  return app;
}

export interface ServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
}

/** Settings are resolved once at startup only to report `config_loaded`; each request resolves its own. */
async function checkSettings(configPath: string | undefined): Promise<boolean> {
  try {
    await loadSettings({ configPath });
    return true;
  } catch (err) {
    logger.warn({ err }, 'Default settings did not resolve; requests must supply them');
    return false;
  }
}

export async function startServer(options: ServerOptions = {}): Promise<Server> {
  const host = options.host ?? DEFAULT_API_HOST;
  const port = options.port ?? DEFAULT_API_PORT;
  const configLoaded = await checkSettings(options.configPath);
  const app = createApp({ configLoaded: () => configLoaded });

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port, apiVersion: APP_VERSION }, `${APP_NAME} API v${APP_VERSION} listening on ${host}:${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  startServer({
    host: process.env.HOST,
    port: process.env.PORT ? Number(process.env.PORT) : undefined,
  }).catch((err: unknown) => {
    logger.fatal({ err }, 'API server failed to start');
    process.exit(1);
  });
}
