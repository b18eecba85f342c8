import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { httpLoggerMiddleware, requestIdMiddleware } from '@lendwise/observability';
import { createV1Router } from './routes/v1.routes';
import { errorHandler } from './middlewares/error-handler';
import type { Orchestrator } from './services/orchestrator.service';

export function createApp(orchestrator: Orchestrator): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(requestIdMiddleware);
  app.use(httpLoggerMiddleware);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'origination-service', timestamp: new Date().toISOString() });
  });

  app.use('/v1', createV1Router(orchestrator));
  app.use(errorHandler);

  return app;
}
