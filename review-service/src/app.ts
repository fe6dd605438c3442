import cors from 'cors';
import type { CorsOptions } from 'cors';
import express from 'express';
import type { Express } from 'express';
import type { Logger } from 'pino';
import type { AppConfig, CorsConfig } from './config/config';
import { errorHandler, notFoundHandler } from './http/errors';
import { requestLogger } from './http/requestLogger';
import { reviewRouter } from './routes/review';
import type { HealthResponse, RootResponse } from './types/types';

export const ROOT_MESSAGE = 'Code-Sentinel API is running';

// A literal '*' cannot be sent alongside credentials, so the wildcard reflects the caller's origin.
function corsOptions(config: CorsConfig): CorsOptions {
  const origin = config.origins.includes('*') ? true : config.origins;
  return { origin, credentials: config.credentials };
}

export function createApp(config: AppConfig, logger: Logger): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger(logger));
  app.use(cors(corsOptions(config.cors)));
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.get('/', (_req, res) => {
    const body: RootResponse = { message: ROOT_MESSAGE };
    res.json(body);
  });

  app.get('/health', (_req, res) => {
    const body: HealthResponse = { status: 'healthy' };
    res.json(body);
  });

  app.use('/api', reviewRouter(logger));

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}
