/**
 * backend/src/modules/employees/employee.service.ts
 *
 * WHY:
 * - Owns CRUD for employee records end-to-end.
 * - Only place allowed to start transactions.
 *
 * RULES:
 * - Validate BEFORE touching the store (a rejected payload never writes).
 * - No raw DB access outside queries/DAL.
 * - Every store call runs under a deadline; driver errors and timeouts are
 *   logged here with full detail and surfaced as STORE_UNAVAILABLE only.
 * - Writes run in a transaction that checks the deadline before commit, so a
 *   write reported as failed never lands late.
 * - No caching across requests: MySQL is the sole owner of records.
 */

import type { DeleteMissingPolicy } from '../../app/config';
import { withTimeout } from '../../shared/async/async';
import type { DbExecutor } from '../../shared/db/db';
import { AppError } from '../../shared/http/errors';
import type { Logger } from '../../shared/logger/logger';

import type { EmployeeRepo } from './dal/employee.repo';
import { EmployeeErrors } from './employee.errors';
import { parseEmployeeFields } from './employee.schemas';
import type { EmployeeFields, EmployeeId, EmployeeRecord } from './employee.types';
import { assertDeleteApplied, assertEmployeeExists } from './policies/employee.policy';
import { countEmployees, getEmployeeById, listEmployees } from './queries/employee.queries';

export type EmployeeServiceDeps = {
  db: DbExecutor;
  logger: Logger;
  employeeRepo: EmployeeRepo;
  timeoutMs: number;
  deleteMissing: DeleteMissingPolicy;
};

export class EmployeeService {
  constructor(private readonly deps: EmployeeServiceDeps) {}

  async listRecords(): Promise<EmployeeRecord[]> {
    return this.store('list', () => listEmployees(this.deps.db));
  }

  async countRecords(): Promise<number> {
    return this.store('count', () => countEmployees(this.deps.db));
  }

  async getRecord(employeeId: EmployeeId): Promise<EmployeeRecord> {
    const employee = await this.store('get', () => getEmployeeById(this.deps.db, employeeId));
    assertEmployeeExists(employee, employeeId);
    return employee;
  }

  async createRecord(raw: unknown): Promise<EmployeeRecord> {
    const fields = this.validate(raw, 'create');

    const employeeId = await this.store('create', (signal) =>
      this.deps.db.transaction().execute(async (trx) => {
        const id = await this.deps.employeeRepo.withDb(trx).insertEmployee(fields);
        signal.throwIfAborted();
        return id;
      }),
    );

    this.deps.logger.info('employees.create.success', {
      flow: 'employees.create',
      employeeId,
    });

    return { id: employeeId, ...fields };
  }

  async updateRecord(employeeId: EmployeeId, raw: unknown): Promise<EmployeeRecord> {
    const fields = this.validate(raw, 'update');

    await this.store('update', (signal) =>
      this.deps.db.transaction().execute(async (trx) => {
        const existing = await getEmployeeById(trx, employeeId);
        assertEmployeeExists(existing, employeeId);

        await this.deps.employeeRepo.withDb(trx).updateEmployee(employeeId, fields);
        signal.throwIfAborted();
      }),
    );

    this.deps.logger.info('employees.update.success', {
      flow: 'employees.update',
      employeeId,
    });

    return { id: employeeId, ...fields };
  }

  async deleteRecord(employeeId: EmployeeId): Promise<void> {
    const deleted = await this.store('delete', (signal) =>
      this.deps.db.transaction().execute(async (trx) => {
        const removed = await this.deps.employeeRepo.withDb(trx).deleteEmployee(employeeId);
        signal.throwIfAborted();
        return removed;
      }),
    );

    assertDeleteApplied(deleted, employeeId, this.deps.deleteMissing);

    this.deps.logger.info('employees.delete.success', {
      flow: 'employees.delete',
      employeeId,
      deleted,
    });
  }

  private validate(raw: unknown, op: 'create' | 'update'): EmployeeFields {
    const parsed = parseEmployeeFields(raw);
    if (parsed.success) return parsed.data;

    this.deps.logger.info('employees.validation_failed', {
      flow: `employees.${op}`,
      fields: Object.keys(parsed.errors),
    });

    throw EmployeeErrors.invalidFields(parsed.errors);
  }

  /**
   * Runs one store operation under the configured deadline.
   * AppErrors raised inside (e.g. NOT_FOUND within a transaction) pass through.
   */
  private async store<T>(op: string, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(work, this.deps.timeoutMs, `employees.${op} timed out`);
    } catch (err) {
      if (err instanceof AppError) throw err;

      this.deps.logger.error('employees.store_error', {
        flow: `employees.${op}`,
        message: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });

      throw EmployeeErrors.storeUnavailable({ op });
    }
  }
}
