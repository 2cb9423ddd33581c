/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection (MySQL via mysql2 pool).
 * - Kysely compiles every query to placeholders + bound parameters,
 *   so no SQL text is ever assembled from user input.
 *
 * HOW TO USE:
 * - DI calls createDb(config.db) once; everything else receives a DbExecutor.
 * - Connections are checked out per query/transaction and always returned
 *   to the pool by Kysely, including on errors.
 */

import { createPool } from 'mysql2';
import { Kysely, MysqlDialect } from 'kysely';

import type { DbConfig } from '../../app/config';
import type { DB } from './db.types';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (services pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(config: DbConfig): Db {
  const pool = createPool({
    host: config.host,
    port: config.port,
    database: config.name,
    user: config.user,
    password: config.password,
    connectionLimit: config.poolSize,
    connectTimeout: config.timeoutMs,
    // DATE columns come back as 'YYYY-MM-DD' instead of local-time Date objects
    dateStrings: true,
  });

  return new Kysely<DB>({
    dialect: new MysqlDialect({ pool }),
  });
}
