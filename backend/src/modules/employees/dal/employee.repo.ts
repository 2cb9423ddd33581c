/**
 * backend/src/modules/employees/dal/employee.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for employees (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { EmployeeFields } from '../employee.types';

function toRowValues(fields: EmployeeFields) {
  return {
    name: fields.name,
    department: fields.department,
    role: fields.role,
    salary: fields.salary,
    start_date: fields.startDate,
  };
}

export class EmployeeRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): EmployeeRepo {
    return new EmployeeRepo(db);
  }

  /**
   * Inserts one row and returns the id the store assigned.
   */
  async insertEmployee(fields: EmployeeFields): Promise<number> {
    const res = await this.db
      .insertInto('employees')
      .values(toRowValues(fields))
      .executeTakeFirstOrThrow();

    if (res.insertId === undefined) {
      throw new Error('employees insert did not report an id');
    }

    return Number(res.insertId);
  }

  /**
   * Returns true if a row with that id was matched.
   */
  async updateEmployee(employeeId: number, fields: EmployeeFields): Promise<boolean> {
    const res = await this.db
      .updateTable('employees')
      .set(toRowValues(fields))
      .where('id', '=', employeeId)
      .executeTakeFirst();

    return Number(res.numUpdatedRows) > 0;
  }

  /**
   * Returns true if a row was removed, false if the id was already absent.
   */
  async deleteEmployee(employeeId: number): Promise<boolean> {
    const res = await this.db
      .deleteFrom('employees')
      .where('id', '=', employeeId)
      .executeTakeFirst();

    return Number(res.numDeletedRows) > 0;
  }
}
