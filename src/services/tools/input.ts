// Parsing of tool input text coming from the model

import type { z } from 'zod';
import type { ToolInputResult } from './types.js';

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * JSON.parse followed by schema validation. Blank input counts as `{}`.
 */
export function parseToolInput<S extends z.ZodTypeAny>(jsonText: string, schema: S): ToolInputResult<z.output<S>> {
  let raw: unknown;
  try {
    raw = JSON.parse(jsonText.trim() || '{}');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: `invalid JSON (${message})` };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return { success: false, error: describeIssues(result.error) };
  }
  return { success: true, data: result.data };
}
