/**
 * ERRORS
 * Error taxonomy for the export pipeline
 */

export type ValidationErrorKind = 'InvalidParameter' | 'InvalidDateFormat' | 'InvalidDateRange';
export type DispatchErrorKind = 'UnknownTaskType' | 'HandlerFailed';

export type ReportErrorCode =
  | ValidationErrorKind
  | DispatchErrorKind
  | 'RENDER_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base class for every error the pipeline raises on purpose.
 * Operational errors are expected conditions (bad task input, an unreachable
 * export directory); anything else is a programming error.
 */
export class ReportError extends Error {
  code: ReportErrorCode;
  isOperational: boolean;

  constructor(message: string, code: ReportErrorCode = 'INTERNAL_ERROR', isOperational: boolean = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends ReportError {
  readonly kind: ValidationErrorKind;
  readonly field: string;
  readonly allowed: readonly (string | number)[];

  constructor(kind: ValidationErrorKind, field: string, message: string, allowed: readonly (string | number)[] = []) {
    super(message, kind, true);
    this.kind = kind;
    this.field = field;
    this.allowed = allowed;
  }
}

export class RenderError extends ReportError {
  constructor(message: string) {
    super(message, 'RENDER_ERROR', false);
  }
}

export class PersistenceError extends ReportError {
  constructor(message: string) {
    super(message, 'PERSISTENCE_ERROR', false);
  }
}

export class DispatchError extends ReportError {
  readonly kind: DispatchErrorKind;

  constructor(kind: DispatchErrorKind, message: string) {
    super(message, kind, true);
    this.kind = kind;
  }
}

/**
 * Predefined errors
 */
export const Errors = {
  InvalidParameter: (field: string, value: unknown, allowed: readonly (string | number)[]) =>
    new ValidationError(
      'InvalidParameter',
      field,
      `Invalid ${field} '${String(value)}'. Must be one of: ${allowed.map(v => `'${v}'`).join(', ')}`,
      allowed
    ),

  InvalidDateFormat: (field: string, value: unknown) =>
    new ValidationError('InvalidDateFormat', field, `Invalid date format for ${field} '${String(value)}'. Use 'YYYY-MM-DD'`),

  InvalidDateRange: (fromField: string, toField: string) =>
    new ValidationError('InvalidDateRange', toField, `${toField} cannot be earlier than ${fromField}`),

  UnknownTaskType: (templateId: unknown) =>
    new DispatchError('UnknownTaskType', `No handler for template task id ${String(templateId)}`),

  HandlerFailed: (name: string, reason: string) =>
    new DispatchError('HandlerFailed', `${name} failed: ${reason}`),

  Render: (sheetName: string) =>
    new RenderError(`Failed to create ${sheetName} sheet`),

  Persistence: (message: string) =>
    new PersistenceError(message),
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
