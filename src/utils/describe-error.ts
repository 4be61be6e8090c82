import { ZodError } from 'zod';
import { HttpError } from '../errors.js';

export function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    const issues = err.issues.map((issue) => {
      const where = issue.path.length ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    return `validation_failed: ${issues.join('; ')}`;
  }

  if (err instanceof HttpError) {
    return `HTTP ${err.statusCode} ${err.message}`;
  }

  if (err instanceof Error) {
    return err.message;
  }

  return String(err);
}
