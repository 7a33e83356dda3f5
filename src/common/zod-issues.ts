import { ZodError } from 'zod';

/**
 * Flatten zod issues into "path: message" strings, optionally prefixed with
 * the location of the validated value (e.g. `values[2]`).
 */
export function describeIssues(error: ZodError, prefix = ''): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
