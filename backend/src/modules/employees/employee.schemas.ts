/**
 * backend/src/modules/employees/employee.schemas.ts
 *
 * WHY:
 * - Centralizes validation for employee fields (HTML forms and JSON API alike).
 * - Prevents invalid payloads from reaching the store.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Strings are trimmed; optional fields left blank become null.
 * - Messages are user-facing (rendered next to the form field).
 */

import { z } from 'zod';

import {
  EMPLOYEE_FIELDS,
  type EmployeeField,
  type EmployeeFieldErrors,
  type EmployeeFields,
  type EmployeeFormValues,
  type EmployeeId,
} from './employee.types';

const MAX_TEXT = 255;
const MAX_SALARY = 2_000_000_000;
const MAX_EMPLOYEE_ID = 2_147_483_647;

function blankToNull(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? null : value;
}

function isCalendarDate(value: string): boolean {
  const [y, m, d] = value.split('-').map(Number);
  if (y === undefined || m === undefined || d === undefined) return false;

  const date = new Date(Date.UTC(y, m - 1, d));
  return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d;
}

function requiredText(label: string) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
    .trim()
    .min(1, `${label} is required`)
    .max(MAX_TEXT, `${label} must be at most ${MAX_TEXT} characters`);
}

function optionalText(label: string) {
  return z
    .preprocess(
      blankToNull,
      z
        .string({ invalid_type_error: `${label} must be text` })
        .trim()
        .max(MAX_TEXT, `${label} must be at most ${MAX_TEXT} characters`)
        .nullish(),
    )
    .transform((value) => value ?? null);
}

const salarySchema = z
  .preprocess(
    (value) => {
      const v = blankToNull(value);
      return typeof v === 'string' ? Number(v.trim()) : v;
    },
    z
      .number({ invalid_type_error: 'Salary must be a whole number' })
      .int('Salary must be a whole number')
      .min(0, 'Salary cannot be negative')
      .max(MAX_SALARY, 'Salary is too large')
      .nullish(),
  )
  .transform((value) => value ?? null);

const startDateSchema = z
  .preprocess(
    blankToNull,
    z
      .string({ invalid_type_error: 'Start date must be a date (YYYY-MM-DD)' })
      .trim()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'Start date must be a date (YYYY-MM-DD)')
      .refine(isCalendarDate, 'Start date is not a valid calendar date')
      .nullish(),
  )
  .transform((value) => value ?? null);

export const employeeFieldsSchema = z.object({
  name: requiredText('Name'),
  department: requiredText('Department'),
  role: optionalText('Role'),
  salary: salarySchema,
  startDate: startDateSchema,
});

export type EmployeeFieldsInput = z.input<typeof employeeFieldsSchema>;

export type ParsedEmployeeFields =
  | { success: true; data: EmployeeFields }
  | { success: false; errors: EmployeeFieldErrors };

function isEmployeeField(value: unknown): value is EmployeeField {
  return EMPLOYEE_FIELDS.some((field) => field === value);
}

/**
 * Validates raw fields (form body or JSON). Returns the first message per field.
 */
export function parseEmployeeFields(raw: unknown): ParsedEmployeeFields {
  const parsed = employeeFieldsSchema.safeParse(raw ?? {});
  if (parsed.success) return { success: true, data: parsed.data };

  const errors: EmployeeFieldErrors = {};
  for (const issue of parsed.error.issues) {
    const field = issue.path[0];
    if (isEmployeeField(field) && errors[field] === undefined) {
      errors[field] = issue.message;
    }
  }

  // Non-object payloads fail at the root; blame the first required field.
  if (Object.keys(errors).length === 0) {
    errors.name = 'Name is required';
  }

  return { success: false, errors };
}

const idParamSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .pipe(z.number().int().positive().max(MAX_EMPLOYEE_ID)),
});

/**
 * Route params -> employee id. Returns null for anything that cannot be an id
 * (callers treat that as an unknown identifier).
 */
export function parseEmployeeId(params: unknown): EmployeeId | null {
  const parsed = idParamSchema.safeParse(params);
  return parsed.success ? parsed.data.id : null;
}

const noticeQuerySchema = z.object({
  notice: z.enum(['created', 'updated', 'deleted']),
});

export type EmployeeNotice = z.infer<typeof noticeQuerySchema>['notice'];

export function parseNotice(query: unknown): EmployeeNotice | null {
  const parsed = noticeQuerySchema.safeParse(query);
  return parsed.success ? parsed.data.notice : null;
}

/**
 * Form bodies (urlencoded) may repeat a key; the first value wins.
 */
export function readFormValues(body: unknown): EmployeeFormValues {
  const source: Record<string, unknown> =
    body && typeof body === 'object' ? Object.fromEntries(Object.entries(body)) : {};

  const pick = (field: EmployeeField): string => {
    const value = source[field];
    const first: unknown = Array.isArray(value) ? value[0] : value;
    if (typeof first === 'string') return first;
    if (typeof first === 'number') return String(first);
    return '';
  };

  return {
    name: pick('name'),
    department: pick('department'),
    role: pick('role'),
    salary: pick('salary'),
    startDate: pick('startDate'),
  };
}

export function toFormValues(fields: EmployeeFields): EmployeeFormValues {
  return {
    name: fields.name,
    department: fields.department,
    role: fields.role ?? '',
    salary: fields.salary === null ? '' : String(fields.salary),
    startDate: fields.startDate ?? '',
  };
}
