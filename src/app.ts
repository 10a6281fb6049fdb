import express, { Express } from 'express';
import { Logger } from 'pino';
import type { TokenConfig } from './config';
import { requireToken } from './middleware/auth';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createHealthRouter } from './routes/health';
import { createSyncRouter } from './routes/sync';
import { SyncEngine } from './services/syncEngine';

export interface AppOptions {
  engine: SyncEngine;
  tokens: TokenConfig[];
  logger: Logger;
  bodyLimit?: string;
}

export function createApp({ engine, tokens, logger, bodyLimit = '10mb' }: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  // Middleware
  app.use(requestLogger(logger));
  app.use(express.json({ limit: bodyLimit }));

  // Routes
  app.use(createHealthRouter());
  app.use('/api/v1', requireToken(tokens), createSyncRouter(engine));

  // Error handling
  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
