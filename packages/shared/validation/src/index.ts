import type { z } from 'zod';
import { ValidationError, type ValidationIssue } from '@shared/errors';
import { fail, ok, type Result } from '@shared/result';

export interface Validator<T> {
  parse(input: unknown): Result<T, ValidationError>;
}

export const toIssues = (error: z.ZodError): ValidationIssue[] =>
  error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));

export const createValidator = <TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  label = 'input',
): Validator<z.output<TSchema>> => ({
  parse: (input) => {
    const parsed = schema.safeParse(input);
    if (parsed.success) {
      return ok(parsed.data);
    }
    const issues = toIssues(parsed.error);
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    return fail(new ValidationError(`invalid ${label}: ${summary}`, issues));
  },
});
