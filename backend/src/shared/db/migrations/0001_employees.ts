/**
 * src/shared/db/migrations/0001_employees.ts
 *
 * WHY:
 * - Single table holding employee records.
 * - Integer auto-increment id: assigned by the store, never by the app.
 *
 * RULES:
 * - DDL must stay portable (MySQL in deployments, SQLite in tests).
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('employees')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('name', 'varchar(255)', (col) => col.notNull())
    .addColumn('department', 'varchar(255)', (col) => col.notNull())
    .addColumn('role', 'varchar(255)')
    .addColumn('salary', 'integer')
    .addColumn('start_date', 'date')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('employees').ifExists().execute();
}
