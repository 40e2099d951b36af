import express from 'express';
import { createReplayRoutes } from './routes/replay.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createRateLimiter } from './middleware/rateLimit.js';
import type { AppConfig } from '../config.js';

/**
 * Build the replay service. Each request replays against its own Bank,
 * so the app holds no ledger state between requests.
 */
export function createApp(config: AppConfig): express.Express {
  const app = express();

  app.use(createRateLimiter(config));

  // Health check endpoint
  app.get('/healthz', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use('/api', createReplayRoutes(config));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
