import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { isRobotError, type RobotErrorKind } from './engine/errors.js';
import type { RobotRegistry } from './engine/registry.js';
import { createRobotRoutes } from './routes/robots.js';

// One status per failure kind; the body's `code` carries the kind itself.
export const ERROR_STATUS: Record<RobotErrorKind, 400 | 404 | 409 | 422> = {
  NotFound: 404,
  InvalidArgument: 400,
  NotHeld: 400,
  Conflict: 409,
  IncapacitatedActor: 409,
  InsufficientEnergy: 422,
};

export interface AppOptions {
  devMode?: boolean;
  /** Per-request access log; off in tests. */
  requestLog?: boolean;
}

export function createApp(registry: RobotRegistry, options: AppOptions = {}) {
  const app = new Hono();

  // Middleware
  app.use('*', cors());
  if (options.requestLog ?? true) {
    app.use('*', logger());
  }

  // API docs
  app.get('/', (c) => {
    return c.json({
      name: 'Robot Service',
      version: '1.0.0',
      endpoints: {
        'GET /robots': 'List all robots',
        'POST /robots': 'Provision a robot { id?, position?, energy? }',
        'GET /robots/:id/status': 'Robot snapshot',
        'POST /robots/:id/move': 'Move one tile { direction: up|down|left|right }',
        'PATCH /robots/:id/state': 'Set energy and/or position',
        'POST /robots/:id/pickup/:itemId': 'Pick up an item',
        'POST /robots/:id/putdown/:itemId': 'Put down a held item',
        'POST /robots/:id/attack/:targetId': 'Attack another robot',
        'GET /robots/:id/actions': 'Action history (?page=1&size=5)',
      },
      rules: registry.rules,
      autoCreate: registry.autoCreate,
    });
  });

  app.route('/robots', createRobotRoutes(registry));

  // ─── 404 ───
  app.notFound((c) => {
    return c.json({ error: 'Not found. Try GET / for available endpoints.' }, 404);
  });

  // ─── Error Handler ───
  app.onError((err, c) => {
    if (isRobotError(err)) {
      return c.json({ error: err.message, code: err.kind }, ERROR_STATUS[err.kind]);
    }
    console.error('🔥 Error:', err.message);
    console.error('Stack:', err.stack);
    return c.json({
      error: 'Internal server error',
      message: options.devMode ? err.message : undefined,
    }, 500);
  });

  return app;
}
