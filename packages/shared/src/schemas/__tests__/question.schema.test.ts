import { describe, it, expect } from 'vitest';
import {
  questionGenerationRequestSchema,
  mcqQuestionSchema,
  extractedMetadataSchema,
} from '../question.schema.js';
import { sketchPromptRequestSchema, askLlmRequestSchema } from '../completion.schema.js';

const VALID_MCQ_QUESTION = {
  question: 'A disc rolls without slipping. What fraction of its kinetic energy is rotational?',
  options: { A: '1/2', B: '1/3', C: '2/3', D: '1/4' },
  correct_answer: 'B',
  explanation: 'Rotational KE is (1/4)mv^2 out of a total of (3/4)mv^2.',
};

describe('questionGenerationRequestSchema', () => {
  it('accepts a query', () => {
    expect(questionGenerationRequestSchema.safeParse({ query: 'JEE rolling motion' }).success).toBe(
      true,
    );
  });

  it('rejects a missing query', () => {
    expect(questionGenerationRequestSchema.safeParse({}).success).toBe(false);
  });
});

describe('mcqQuestionSchema', () => {
  it('accepts a question with four lettered options', () => {
    expect(mcqQuestionSchema.safeParse(VALID_MCQ_QUESTION).success).toBe(true);
  });

  it('rejects a correct_answer outside A-D', () => {
    const result = mcqQuestionSchema.safeParse({ ...VALID_MCQ_QUESTION, correct_answer: 'E' });
    expect(result.success).toBe(false);
  });

  it('rejects a lowercase correct_answer', () => {
    const result = mcqQuestionSchema.safeParse({ ...VALID_MCQ_QUESTION, correct_answer: 'b' });
    expect(result.success).toBe(false);
  });

  it('rejects options missing a key', () => {
    const result = mcqQuestionSchema.safeParse({
      ...VALID_MCQ_QUESTION,
      options: { A: '1/2', B: '1/3', C: '2/3' },
    });
    expect(result.success).toBe(false);
  });

  it('rejects options with an extra key', () => {
    const result = mcqQuestionSchema.safeParse({
      ...VALID_MCQ_QUESTION,
      options: { ...VALID_MCQ_QUESTION.options, E: '1' },
    });
    expect(result.success).toBe(false);
  });

  it('rejects options given as an array', () => {
    const result = mcqQuestionSchema.safeParse({
      ...VALID_MCQ_QUESTION,
      options: ['1/2', '1/3', '2/3', '1/4'],
    });
    expect(result.success).toBe(false);
  });
});

describe('extractedMetadataSchema', () => {
  it('accepts metadata with tags', () => {
    const result = extractedMetadataSchema.safeParse({
      subject: 'Physics',
      difficulty: 'hard',
      tags: ['rolling', 'friction'],
    });
    expect(result.success).toBe(true);
  });

  it('accepts a subject outside the known table', () => {
    const result = extractedMetadataSchema.safeParse({
      subject: 'Biology',
      difficulty: 'medium',
      tags: [],
    });
    expect(result.success).toBe(true);
  });

  it('rejects an unknown difficulty', () => {
    const result = extractedMetadataSchema.safeParse({
      subject: 'Physics',
      difficulty: 'extreme',
      tags: [],
    });
    expect(result.success).toBe(false);
  });

  it('rejects missing tags', () => {
    const result = extractedMetadataSchema.safeParse({ subject: 'Physics', difficulty: 'easy' });
    expect(result.success).toBe(false);
  });
});

describe('sketchPromptRequestSchema', () => {
  it('rejects an empty explanation', () => {
    const result = sketchPromptRequestSchema.safeParse({
      question_text: 'A rod is hinged at one end.',
      explanation_text: '',
    });
    expect(result.success).toBe(false);
  });
});

describe('askLlmRequestSchema', () => {
  it('leaves model undefined when omitted', () => {
    const result = askLlmRequestSchema.safeParse({ prompt: 'Explain torque' });
    expect(result.success).toBe(true);
    if (result.success) expect(result.data.model).toBeUndefined();
  });
});
