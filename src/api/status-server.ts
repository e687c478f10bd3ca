import express, { type NextFunction, type Request, type Response } from 'express';

import { toError } from '../errors.js';
import type { LivenessDriver } from '../harness/driver.js';
import { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';

const logger = new Logger('status-server');

export function createStatusApp(driver: LivenessDriver, metrics: MetricsRegistry): express.Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
    });
  });

  app.get('/status', (_req, res) => {
    res.json(driver.snapshot());
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      res.setHeader('Content-Type', metrics.registry.contentType);
      res.send(await metrics.registry.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = toError(error).message;
    logger.error('status request failed', { error: message });
    res.status(500).json({ error: message });
  });

  return app;
}
