import type { z } from 'zod';

// "thresholds.verified: Number must be less than or equal to 1; ..."
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
