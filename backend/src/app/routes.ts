/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (employees, assets)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { AppError } from '../shared/http/errors';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Liveness + store reachability (readiness check)
  app.get('/health', async (req, reply) => {
    let store: 'up' | 'down' = 'up';
    try {
      await opts.deps.employees.employeeService.countRecords();
    } catch (err) {
      if (!(err instanceof AppError)) throw err;
      store = 'down';
    }

    return reply.status(store === 'up' ? 200 : 503).send({
      ok: store === 'up',
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
      store,
    });
  });

  // Module routes
  opts.deps.employees.registerRoutes(app);
  opts.deps.assets.registerRoutes(app);
}
