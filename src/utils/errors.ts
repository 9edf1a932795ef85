// src/utils/errors.ts
import type { ZodError } from 'zod';

export type FieldIssue = { field: string; message: string };

export type ErrorBody = {
  error: string;
  message: string;
  issues?: FieldIssue[];
  error_id?: string;
};

export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = [], status = 400, code = 'validation_error') {
    super(message, status, code);
    this.issues = issues;
  }
}

/** A unique field (phone number) is already taken. */
export class ConflictError extends ValidationError {
  constructor(message: string, issues: FieldIssue[] = []) {
    super(message, issues, 409, 'conflict');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'not_found');
  }
}

export class ConfigError extends Error {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function issuesFromZod(err: ZodError): FieldIssue[] {
  return err.issues.map((i) => ({
    field: i.path.length ? i.path.join('.') : '(root)',
    message: i.message,
  }));
}

export function fromZodError(err: ZodError, message = 'Invalid request'): ValidationError {
  return new ValidationError(message, issuesFromZod(err));
}

const REDACT_PATTERNS = [
  /(password|secret|token)=([^\s&]+)/gi,
];

export function redact(s: string): string {
  let out = s;
  for (const re of REDACT_PATTERNS) out = out.replace(re, (_m, k: string) => `${k}=***`);
  return out;
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: redact(err.message || 'unknown'),
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: redact(String(err)),
    stack: '',
  };
}

export function buildErrorId(): string {
  // tiny, non-crypto id for correlating logs ↔ client response
  return Math.random().toString(36).slice(2, 10);
}

/**
 * HTTP status and JSON body for an error. Unexpected errors get a 500 with a
 * generated `error_id`; the caller logs it.
 */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ValidationError) {
    return { status: err.status, body: { error: err.code, message: err.message, issues: err.issues } };
  }
  if (err instanceof AppError) {
    return { status: err.status, body: { error: err.code, message: err.message } };
  }
  return {
    status: 500,
    body: { error: 'internal_error', message: 'Something went wrong. Try again.', error_id: buildErrorId() },
  };
}
