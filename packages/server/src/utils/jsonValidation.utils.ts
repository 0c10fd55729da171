import type { ZodType, ZodTypeDef } from 'zod';
import { FailureKind } from '@coursewright/shared';
import { ok, fail, type Result } from './result.js';

const SNIPPET_LENGTH = 300;

// Matches a response that is entirely one fenced block: ```json\n...\n```
const FENCED_BLOCK = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

/**
 * Returns the JSON candidate inside a model response. Models asked for raw
 * JSON still occasionally wrap it in a Markdown fence; anything else is
 * returned trimmed and left for JSON.parse to judge.
 */
export const extractJsonText = (raw: string): string => {
  const trimmed = raw.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
};

/**
 * Validates untrusted model output against a schema.
 * Parse failure and schema failure are reported as distinct kinds; a value
 * is only returned when it satisfies the schema completely.
 */
export const validateJson = <T>(
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Result<T> => {
  const text = extractJsonText(raw);
  const snippet = text.slice(0, SNIPPET_LENGTH);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return fail({
      kind: FailureKind.PARSE,
      message: err instanceof Error ? err.message : 'Response is not valid JSON',
      snippet,
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return fail({
      kind: FailureKind.SCHEMA,
      message: 'Response does not match the expected shape',
      issues: result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
      snippet,
    });
  }

  return ok(result.data);
};
