import type { ZodError } from 'zod';
import { AppError } from './app-error.js';
import { ErrorCodes } from './error-codes.js';

export interface FieldIssue {
  field: string;
  message: string;
}

export function formatZodError(error: ZodError): AppError {
  const issues: FieldIssue[] = error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

  return new AppError('Validation failed', 400, true, ErrorCodes.VALIDATION_ERROR, { issues });
}

/**
 * Same shape as {@link formatZodError}, for the issue list Fastify attaches
 * when a route schema rejects a request. `instancePath` looks like `/a/b`.
 */
export function formatSchemaIssues(
  validation: ReadonlyArray<{ instancePath: string; message?: string }>
): FieldIssue[] {
  return validation.map((issue) => ({
    field: issue.instancePath.replace(/^\//, '').split('/').join('.'),
    message: issue.message ?? 'Invalid value',
  }));
}
