/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. employees/employee.errors.ts).
 */

export const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'FORBIDDEN',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'STORE_UNAVAILABLE',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; status: number; meta?: AppErrorMeta }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
  }

  // Reserved: no route requires a session yet.
  static unauthorized(meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message: 'Unauthorized', meta });
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta) {
    return new AppError({ code: 'FORBIDDEN', status: 403, message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static storeUnavailable(meta?: AppErrorMeta) {
    return new AppError({
      code: 'STORE_UNAVAILABLE',
      status: 503,
      message: 'Service temporarily unavailable. Please try again later.',
      meta,
    });
  }
}

/**
 * Validation failure that names the offending fields.
 * Unlike `meta`, `fields` holds user-facing messages and is safe to send to clients.
 */
export class FieldValidationError extends AppError {
  readonly fields: Readonly<Record<string, string>>;

  constructor(fields: Record<string, string>, message = 'Validation error', meta?: AppErrorMeta) {
    super({ code: 'VALIDATION_ERROR', status: 400, message, meta });
    this.name = 'FieldValidationError';
    this.fields = Object.freeze({ ...fields });
  }
}
