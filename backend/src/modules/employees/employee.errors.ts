/**
 * backend/src/modules/employees/employee.errors.ts
 *
 * WHY:
 * - Employees module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Store failures carry only the operation name in meta (no SQL, no credentials).
 */

import { AppError, FieldValidationError, type AppErrorMeta } from '../../shared/http/errors';
import type { EmployeeFieldErrors, EmployeeId } from './employee.types';

export const EmployeeErrors = {
  employeeNotFound(employeeId: EmployeeId | null, meta?: AppErrorMeta) {
    return AppError.notFound('Employee not found', { employeeId, ...meta });
  },

  invalidFields(fieldErrors: EmployeeFieldErrors) {
    const fields: Record<string, string> = {};
    for (const [field, message] of Object.entries(fieldErrors)) {
      if (message !== undefined) fields[field] = message;
    }

    return new FieldValidationError(fields, 'Invalid employee fields', {
      fields: Object.keys(fields),
    });
  },

  storeUnavailable(meta?: AppErrorMeta) {
    return AppError.storeUnavailable(meta);
  },
} as const;
