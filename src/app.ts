/**
 * Express application factory
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import type { DebateService } from './services/debate/debate-service.js';
import { createDebateRoutes } from './routes/debate-routes.js';
import { createRequestLogger, errorLogger, isBodyParseError } from './middleware/request-logger.js';

/**
 * Build the app around `service`. No listening and no process hooks here.
 */
export function createApp(service: DebateService): express.Express {
  const app = express();

  // CORS
  app.use((req, res, next) => {
    const allowedOrigin = process.env.FRONTEND_URL || '*';
    res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  app.use(express.json());
  app.use(createRequestLogger({ slowThresholdMs: 2000 }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      runningDebates: service.runningCount(),
    });
  });

  app.use('/api', createDebateRoutes(service));

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  app.use(errorLogger);

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  return app;
}
