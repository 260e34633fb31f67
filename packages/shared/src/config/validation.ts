import type { ZodError } from 'zod';

/**
 * Renders zod issues one per line as `- path: message`.
 * Issues on the root object are shown as `(root)`.
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `- ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
