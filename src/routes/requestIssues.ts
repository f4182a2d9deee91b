import { z, type ZodError } from 'zod';
import { I32_MIN, I32_MAX } from '../compute';

/** Chunk corner coordinate: fits the uniform's i32 fields. */
export const Int32Schema = z.number().int().min(I32_MIN).max(I32_MAX);

/** One "path: message" line per issue, for 400 responses. */
export function formatRequestIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
}
