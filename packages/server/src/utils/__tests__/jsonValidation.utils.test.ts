import { describe, it, expect } from 'vitest';
import { FailureKind, mcqQuestionSchema, topicDetailsSchema } from '@coursewright/shared';
import { extractJsonText, validateJson } from '../jsonValidation.utils.js';

const DETAILS = {
  prerequisites: ['Vectors'],
  problem_solving_tips: ['Draw a free body diagram'],
  common_pitfalls: ['Ignoring friction'],
};

describe('extractJsonText', () => {
  it('returns trimmed text when there is no fence', () => {
    expect(extractJsonText('  {"a": 1}\n')).toBe('{"a": 1}');
  });

  it('strips a ```json fence wrapping the whole response', () => {
    expect(extractJsonText('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('strips a bare ``` fence', () => {
    expect(extractJsonText('```\n[1, 2]\n```')).toBe('[1, 2]');
  });

  it('leaves text alone when the fence does not wrap everything', () => {
    const raw = 'Here you go:\n```json\n{"a": 1}\n```';
    expect(extractJsonText(raw)).toBe(raw);
  });
});

describe('validateJson', () => {
  it('returns the parsed value when it matches the schema', () => {
    const result = validateJson(JSON.stringify(DETAILS), topicDetailsSchema);
    expect(result).toEqual({ ok: true, value: DETAILS });
  });

  it('accepts fenced JSON', () => {
    const result = validateJson('```json\n' + JSON.stringify(DETAILS) + '\n```', topicDetailsSchema);
    expect(result.ok).toBe(true);
  });

  it('reports a parse failure with a snippet for non-JSON text', () => {
    const result = validateJson('Sure! Here are the details.', topicDetailsSchema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe(FailureKind.PARSE);
    expect(result.failure.snippet).toBe('Sure! Here are the details.');
  });

  it('reports a schema failure for JSON missing a required field, never a partial value', () => {
    const { common_pitfalls: _omitted, ...partial } = DETAILS;
    const result = validateJson(JSON.stringify(partial), topicDetailsSchema);
    expect(result).toEqual({
      ok: false,
      failure: {
        kind: FailureKind.SCHEMA,
        message: 'Response does not match the expected shape',
        issues: ['common_pitfalls: Required'],
        snippet: JSON.stringify(partial),
      },
    });
  });

  it('reports every schema issue by path', () => {
    const mcq = {
      question: 'q',
      options: { A: 'a', B: 'b', C: 'c' },
      correct_answer: 'E',
      explanation: 'e',
    };
    const result = validateJson(JSON.stringify(mcq), mcqQuestionSchema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe(FailureKind.SCHEMA);
    expect(result.failure.issues).toContain('options.D: Required');
    expect(result.failure.issues?.some((i) => i.startsWith('correct_answer: '))).toBe(true);
  });

  it('reports a root-level type mismatch without a path prefix', () => {
    const result = validateJson('[]', topicDetailsSchema);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.issues).toEqual(['Expected object, received array']);
  });
});
