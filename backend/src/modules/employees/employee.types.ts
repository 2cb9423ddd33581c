/**
 * backend/src/modules/employees/employee.types.ts
 *
 * WHY:
 * - Domain types for the Employees module.
 * - Queries shape DB rows into these types (keeps DB shapes isolated).
 *
 * RULES:
 * - Keep aligned with DB schema (employees.start_date is a DATE).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type EmployeeId = number;

export type EmployeeFields = {
  name: string;
  department: string;
  role: string | null;
  salary: number | null;
  // 'YYYY-MM-DD'
  startDate: string | null;
};

export type EmployeeRecord = { id: EmployeeId } & EmployeeFields;

export type EmployeeField = keyof EmployeeFields;

export const EMPLOYEE_FIELDS: readonly EmployeeField[] = [
  'name',
  'department',
  'role',
  'salary',
  'startDate',
];

export type EmployeeFieldErrors = Partial<Record<EmployeeField, string>>;

// Raw form values, exactly as submitted (used to re-render a rejected form).
export type EmployeeFormValues = Record<EmployeeField, string>;
