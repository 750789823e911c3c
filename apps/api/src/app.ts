import { Hono } from 'hono';
import { createSessionRoutes } from './routes/sessions';
import type { SessionStore } from './services/course-qa';
import { createLogger } from './services/logger';

const log = createLogger('http');

export function createApp(store: SessionStore) {
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));
  app.route('/api', createSessionRoutes(store));

  app.onError((err, c) => {
    log.error({ err, path: c.req.path }, 'unhandled request error');
    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'Internal server error',
        },
      },
      500
    );
  });

  return app;
}
