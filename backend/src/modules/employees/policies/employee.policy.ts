/**
 * Employee record rules:
 * - Pure (no DB / no I/O)
 * - Throws module-level EmployeeErrors
 */

import type { DeleteMissingPolicy } from '../../../app/config';
import { EmployeeErrors } from '../employee.errors';
import type { EmployeeId, EmployeeRecord } from '../employee.types';

export function assertEmployeeExists(
  employee: EmployeeRecord | undefined,
  employeeId: EmployeeId,
): asserts employee is EmployeeRecord {
  if (!employee) {
    throw EmployeeErrors.employeeNotFound(employeeId);
  }
}

/**
 * Deleting an id that is already gone (stale link, double submit) reports
 * NOT_FOUND unless the deployment opts into idempotent deletes.
 */
export function assertDeleteApplied(
  deleted: boolean,
  employeeId: EmployeeId,
  policy: DeleteMissingPolicy,
): void {
  if (!deleted && policy === 'not_found') {
    throw EmployeeErrors.employeeNotFound(employeeId, { op: 'delete' });
  }
}
