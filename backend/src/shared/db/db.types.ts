/**
 * backend/src/shared/db/db.types.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type every query.
 * - Must mirror the migrations in ./migrations exactly (snake_case columns).
 *
 * RULES:
 * - Update this file in the same change as any new migration.
 * - DB shapes stay inside DAL/queries; modules expose camelCase domain types.
 */

import type { Generated } from 'kysely';

export interface EmployeesTable {
  id: Generated<number>;
  name: string;
  department: string;
  role: string | null;
  salary: number | null;
  // DATE, read back as 'YYYY-MM-DD' (pool uses dateStrings)
  start_date: string | null;
}

export interface DB {
  employees: EmployeesTable;
}
