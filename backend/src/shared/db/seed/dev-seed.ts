/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates a few sample employees when the table is empty.
 * Idempotent: safe to run on every start (skips as soon as any row exists).
 */

import type { DbExecutor } from '../db';
import { logger } from '../../logger/logger';
import type { EmployeeRepo } from '../../../modules/employees/dal/employee.repo';
import type { EmployeeFields } from '../../../modules/employees/employee.types';
import { countEmployees } from '../../../modules/employees/queries/employee.queries';

const SAMPLE_EMPLOYEES: readonly EmployeeFields[] = [
  { name: 'Ada Park', department: 'Engineering', role: 'Backend developer', salary: 92000, startDate: '2022-04-11' },
  { name: 'Sam Ortiz', department: 'Operations', role: 'Site reliability', salary: 88000, startDate: '2021-09-01' },
  { name: 'Lee Novak', department: 'Design', role: null, salary: null, startDate: null },
];

export async function runDevSeed(opts: {
  db: DbExecutor;
  employeeRepo: EmployeeRepo;
}): Promise<void> {
  const flow = 'seed.dev';

  const existing = await countEmployees(opts.db);
  if (existing > 0) {
    logger.info('seed.employees.exist', { flow, count: existing });
    return;
  }

  await opts.db.transaction().execute(async (trx) => {
    const repo = opts.employeeRepo.withDb(trx);
    for (const employee of SAMPLE_EMPLOYEES) {
      await repo.insertEmployee(employee);
    }
  });

  logger.info('seed.employees.created', { flow, count: SAMPLE_EMPLOYEES.length });
}
