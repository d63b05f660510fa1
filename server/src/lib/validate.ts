import { z } from 'zod';

/**
 * Validates a value (request body, kind config, stored record) against a Zod
 * schema without throwing.
 */
export function validateBody<T extends z.ZodType>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: z.ZodIssue[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }
  return { success: true, data: result.data };
}

/** `path: message` per issue, joined with "; ". */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ');
}
