/**
 * JSON Extractor
 *
 * Pulls schema-valid JSON out of free-form model text. Candidates are tried in
 * order of specificity:
 * 1. The full text
 * 2. ```json fenced blocks
 * 3. The outermost { ... } span
 *
 * Returns a result instead of throwing: malformed output is an expected
 * outcome that the planning stage retries, not an exception.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';

export type JsonExtraction<T> =
  | { ok: true; value: T }
  | { ok: false; detail: string };

/**
 * Extract the first candidate that parses and validates against `schema`.
 *
 * @example
 * ```typescript
 * const outcome = extractJson(text, OutlineSchema);
 * if (!outcome.ok) debug('[planning] %s', outcome.detail);
 * ```
 */
export function extractJson<T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): JsonExtraction<T> {
  const candidates = collectCandidates(text);
  let lastZodError: ZodError | undefined;
  let parsedAny = false;

  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    parsedAny = true;

    const result = schema.safeParse(parsed);
    if (result.success) {
      return { ok: true, value: result.data };
    }
    lastZodError = result.error;
  }

  if (!parsedAny) {
    return {
      ok: false,
      detail: `No JSON found in model output (${text.length} chars, ${candidates.length} candidates tried)`,
    };
  }
  return { ok: false, detail: `Model output failed schema validation: ${summarizeZodError(lastZodError)}` };
}

/** First three issues as `path: message`. */
export function summarizeZodError(error: ZodError | undefined): string {
  if (!error) return 'unknown validation error';
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function collectCandidates(text: string): string[] {
  const candidates: string[] = [];
  const trimmed = text.trim();
  if (trimmed) candidates.push(trimmed);

  const fencedPattern = /```(?:json)?\s*\n([\s\S]*?)```/g;
  let match: RegExpExecArray | null;
  while ((match = fencedPattern.exec(text)) !== null) {
    const block = match[1]?.trim();
    if (block) candidates.push(block);
  }

  const braceMatch = trimmed.match(/\{[\s\S]*\}/);
  if (braceMatch) candidates.push(braceMatch[0]);

  return candidates;
}
