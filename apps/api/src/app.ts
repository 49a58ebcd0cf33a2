import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { type DB, InvalidParameterError } from '@splitloan/engine';
import { AppError } from './errors.js';
import { simulateRoutes } from './routes/simulate.js';
import { sessionRoutes } from './routes/sessions.js';

export function createApp(db: DB) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json({ error: { code: err.code, message: err.message, suggestion: err.suggestion } }, err.status);
    }
    if (err instanceof InvalidParameterError) {
      return c.json(
        {
          error: {
            code: err.code,
            message: err.message,
            suggestion: `Check the '${err.parameter}' value`,
          },
        },
        400,
      );
    }
    console.error(err);
    return c.json({ error: { code: 'INTERNAL_ERROR', message: err.message, suggestion: 'Check server logs' } }, 500);
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: '0.1.0' }));

  app.route('/api/v1/simulate', simulateRoutes());
  app.route('/api/v1/sessions', sessionRoutes(db));

  return app;
}
