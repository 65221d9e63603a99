/**
 * JSON response parsing utilities with Zod validation.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

export type ParseResult<T> =
  | { success: true; data: T; rawResponse: string }
  | { success: false; error: string; rawResponse: string };

/**
 * Extract JSON from a response that may be wrapped in a markdown code fence
 * (with or without a language tag) or surrounded by prose.
 */
export function extractJson(response: string): string {
  const trimmed = response.trim();

  const fenced = trimmed.match(/```[\w-]*\s*([\s\S]*?)```/);
  if (fenced) {
    return fenced[1]?.trim() ?? '';
  }

  // Unterminated fence: drop the opening line
  if (trimmed.startsWith('```')) {
    return trimmed.replace(/^```[\w-]*\s*/, '').trim();
  }

  const objectMatch = trimmed.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
  if (objectMatch) {
    return objectMatch[1] ?? trimmed;
  }

  return trimmed;
}

/**
 * Parse and validate JSON response against a Zod schema.
 */
export function parseJsonResponse<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParseResult<T> {
  const rawResponse = response;

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJson(response));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Invalid JSON: ${message}`, rawResponse };
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((i: z.ZodIssue) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    return { success: false, error: `Validation failed: ${issues}`, rawResponse };
  }

  return { success: true, data: validated.data, rawResponse };
}

/**
 * Parse JSON response, applying fixers one after another until one parse succeeds.
 */
export function parseWithRetry<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fixers: Array<(input: string) => string> = defaultFixers,
): ParseResult<T> {
  let result = parseJsonResponse(response, schema);
  if (result.success) return result;

  let fixed = extractJson(response);
  for (const fixer of fixers) {
    fixed = fixer(fixed);
    const attempt = parseJsonResponse(fixed, schema);
    if (attempt.success) return { ...attempt, rawResponse: response };
    result = { ...attempt, rawResponse: response };
  }

  return result;
}

/**
 * Common JSON fixers for LLM output issues.
 */
export const jsonFixers = {
  /** Remove trailing commas in arrays/objects */
  removeTrailingCommas: (input: string): string => {
    return input.replace(/,\s*([}\]])/g, '$1');
  },

  /** Quote bare keys at the start of an object member */
  quoteKeys: (input: string): string => {
    return input.replace(/([{,]\s*)([a-zA-Z_][a-zA-Z0-9_]*)\s*:/g, '$1"$2":');
  },
};

export const defaultFixers = [jsonFixers.removeTrailingCommas, jsonFixers.quoteKeys];
