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
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 * - `meta` is for logs only; `fieldErrors` is the only detail ever sent to clients.
 */

const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'CONFLICT',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

/** Field name -> messages, e.g. { fullName: ['Full name is required.'] } */
export type FieldErrors = Record<string, string[]>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;
  readonly fieldErrors?: FieldErrors;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    fieldErrors?: FieldErrors;
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
    this.fieldErrors = opts.fieldErrors;
  }

  static unauthorized(meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message: 'Unauthorized', meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(message = 'Validation failed.', fieldErrors?: FieldErrors) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, fieldErrors });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', status: 409, message, meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta) {
    return new AppError({ code: 'INTERNAL', status: 500, message, meta });
  }
}
