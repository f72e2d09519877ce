/**
 * Model output parsing with zod validation.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

export type ParseResult<T> =
  | { success: true; data: T; rawResponse: string }
  | { success: false; error: string; rawResponse: string };

/**
 * Extract JSON from a reply that may wrap it in prose or a markdown fence.
 */
export function extractJson(response: string): string {
  const trimmed = response.trim();

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    return fenced[1].trim();
  }

  const bare = trimmed.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
  if (bare) {
    return bare[1];
  }

  return trimmed;
}

/**
 * Parse and validate a model reply against a schema.
 */
export function parseJsonResponse<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): ParseResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(response));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Invalid JSON: ${message}`, rawResponse: response };
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    return {
      success: false,
      error: `Validation failed: ${formatIssues(validated.error)}`,
      rawResponse: response,
    };
  }
  return { success: true, data: validated.data, rawResponse: response };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Fixers for common model formatting slips
 */
export const jsonFixers = {
  removeTrailingCommas: (input: string): string => input.replace(/,\s*([}\]])/g, '$1'),
  stripBom: (input: string): string => input.replace(/^\uFEFF/, ''),
};

/**
 * Parse, then retry after each fixer in turn.
 */
export function parseWithFixers<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fixers: Array<(input: string) => string> = [jsonFixers.stripBom, jsonFixers.removeTrailingCommas]
): ParseResult<T> {
  let result = parseJsonResponse(response, schema);
  if (result.success) return result;

  let fixed = response;
  for (const fixer of fixers) {
    fixed = fixer(fixed);
    const attempt = parseJsonResponse(fixed, schema);
    if (attempt.success) {
      return { ...attempt, rawResponse: response };
    }
    result = { ...attempt, rawResponse: response };
  }
  return result;
}
