/**
 * backend/src/modules/employees/dal/employee.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for employees (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - Typed values only; never accept SQL fragments.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { EmployeesTable } from '../../../shared/db/db.types';

export type EmployeeRow = Selectable<EmployeesTable>;

export async function selectEmployeesSql(db: DbExecutor): Promise<EmployeeRow[]> {
  return db.selectFrom('employees').selectAll().orderBy('id', 'asc').execute();
}

export async function selectEmployeeByIdSql(
  db: DbExecutor,
  employeeId: number,
): Promise<EmployeeRow | undefined> {
  return db.selectFrom('employees').selectAll().where('id', '=', employeeId).executeTakeFirst();
}

export async function countEmployeesSql(db: DbExecutor): Promise<number> {
  const row = await db
    .selectFrom('employees')
    .select((eb) => eb.fn.countAll().as('count'))
    .executeTakeFirstOrThrow();

  // MySQL may return COUNT(*) as string or bigint depending on driver flags
  return Number(row.count);
}
