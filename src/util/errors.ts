import type { ZodError } from 'zod';

export type ErrorCode = 'INPUT_VALIDATION' | 'NOT_FOUND' | 'CONFIG';

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INPUT_VALIDATION', message);
    this.issues = issues;
  }

  static fromZod(context: string, err: ZodError): InputValidationError {
    const issues = err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    return new InputValidationError(`invalid ${context}: ${issues.join('; ')}`, issues);
  }
}

export class NotFoundError extends AppError {
  readonly entity: 'customer' | 'loan';
  readonly id: number;

  constructor(entity: 'customer' | 'loan', id: number) {
    super('NOT_FOUND', `${entity} ${id} not found`);
    this.entity = entity;
    this.id = id;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      code: err instanceof AppError ? err.code : undefined,
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    code: undefined,
    stack: '',
  };
}

export function shortStack(err: unknown, lines = 3): string {
  const st = err instanceof Error && err.stack ? err.stack : '';
  if (!st) return '';
  return st.split('\n').slice(0, lines + 1).join('\n');
}
