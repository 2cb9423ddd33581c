import { Kysely, SqliteDialect } from 'kysely';
import type { Db } from '../../src/shared/db/db';
import type { DB } from '../../src/shared/db/db.types';
import { migrateToLatest } from '../../src/shared/db/migrator';
import { openSqlJsDatabase } from './sqljs-database';

/**
 * WHY:
 * - DAL/service/E2E tests need a real SQL engine without external infra.
 * - In-memory SQLite (sql.js) behind the same Kysely interface, migrated with
 *   the same migrations MySQL gets.
 */
export async function createTestDb(): Promise<Db> {
  const db = new Kysely<DB>({
    dialect: new SqliteDialect({ database: await openSqlJsDatabase() }),
  });

  await migrateToLatest(db);
  return db;
}
