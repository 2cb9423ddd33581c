/**
 * backend/src/modules/employees/queries/employee.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into EmployeeRecord domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countEmployeesSql,
  selectEmployeeByIdSql,
  selectEmployeesSql,
  type EmployeeRow,
} from '../dal/employee.query-sql';
import type { EmployeeRecord } from '../employee.types';

function toEmployee(row: EmployeeRow): EmployeeRecord {
  return {
    id: Number(row.id),
    name: row.name,
    department: row.department,
    role: row.role ?? null,
    salary: row.salary === null ? null : Number(row.salary),
    startDate: row.start_date ?? null,
  };
}

export async function listEmployees(db: DbExecutor): Promise<EmployeeRecord[]> {
  const rows = await selectEmployeesSql(db);
  return rows.map(toEmployee);
}

export async function getEmployeeById(
  db: DbExecutor,
  employeeId: number,
): Promise<EmployeeRecord | undefined> {
  const row = await selectEmployeeByIdSql(db, employeeId);
  if (!row) return undefined;
  return toEmployee(row);
}

export async function countEmployees(db: DbExecutor): Promise<number> {
  return countEmployeesSql(db);
}
