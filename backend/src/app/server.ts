/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; module routes are added by app/routes.ts.
 */

import Fastify from 'fastify';
import formbody from '@fastify/formbody';

import { logger } from '../shared/logger/logger';
import type { PageChrome } from '../shared/html/layout';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { chrome: PageChrome }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  // HTML forms post application/x-www-form-urlencoded
  await app.register(formbody);

  registerRequestContext(app);
  registerErrorHandler(app, { chrome: opts.chrome });

  // Basic request logging (includes requestId + host)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
    });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    logger.info('response', {
      method: req.method,
      url: req.url,
      status: reply.statusCode,
      requestId: req.requestContext.requestId,
      durationMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  return app;
}
