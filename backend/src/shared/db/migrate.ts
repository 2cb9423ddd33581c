/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply schema migrations to MySQL before the app starts (init container / job).
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import { buildConfig, describeConfig } from '../../app/config';
import { createDb } from './db';
import { migrateToLatest } from './migrator';
import { configureLogger, logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  configureLogger({ level: config.logLevel, service: config.serviceName, env: config.nodeEnv });

  const db = createDb(config.db);

  logger.info('migrations.start', { db: describeConfig(config).db });

  try {
    await migrateToLatest(db);
    logger.info('migrations.up_to_date');
  } finally {
    await db.destroy();
  }
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.failed', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
