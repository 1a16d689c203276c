import type { ZodError } from 'zod';

/**
 * Error carrying the HTTP status the API should answer with.
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly details?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * `details` text for a failed zod parse of a request body or query string.
 */
export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}
