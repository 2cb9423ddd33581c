/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { configureLogger, logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  configureLogger({ level: config.logLevel, service: config.serviceName, env: config.nodeEnv });

  const deps = buildDeps(config, overrides);
  const app = await buildServer({ chrome: deps.assets.pageChrome.plain() });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow });
      await runDevSeed({ db: deps.db, employeeRepo: deps.employees.employeeRepo });
      logger.info('seed.done', { flow });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
