import express, { Application, Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import type { CorpusStore } from './corpus-store.js';
import { CorpusError } from './errors.js';
import { createApiRoutes, type ApiOptions } from './routes/api.js';

/**
 * Options for building the Express application
 */
export interface AppOptions extends ApiOptions {
  /** Log each request with morgan (off in tests) */
  logRequests: boolean;
}

/**
 * Create and configure the Express application
 */
export function createApp(store: CorpusStore, options: AppOptions): Application {
  const app = express();

  // Middleware
  app.use(express.json());
  if (options.logRequests) {
    app.use(morgan('dev'));
  }

  // API routes
  app.use('/api', createApiRoutes(store, options));

  // Health check
  app.get('/health', (_req, res) => {
    if (!store.isLoaded()) {
      res.status(503).json({ status: 'loading' });
      return;
    }
    const { index, loadedAt } = store.current();
    res.json({
      status: 'ok',
      verses: index.size(),
      loadedAt: loadedAt.toISOString()
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Core errors carry their own status; anything else is a bug
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof CorpusError) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
