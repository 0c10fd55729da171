import { z } from 'zod';
import { QuestionDifficulty } from '../enums/index.js';
import { MCQ_OPTION_KEYS } from '../constants/content.constants.js';
import { QUERY_MAX_LENGTH } from '../constants/job.constants.js';

// Request schemas

export const questionGenerationRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(QUERY_MAX_LENGTH),
});

// LLM output validation schemas

export const mcqOptionKeySchema = z.enum(MCQ_OPTION_KEYS);

export const mcqOptionsSchema = z
  .object({
    A: z.string().min(1),
    B: z.string().min(1),
    C: z.string().min(1),
    D: z.string().min(1),
  })
  .strict();

export const mcqQuestionSchema = z.object({
  question: z.string().min(1),
  options: mcqOptionsSchema,
  correct_answer: mcqOptionKeySchema,
  explanation: z.string().min(1),
});

export const extractedMetadataSchema = z.object({
  subject: z.string().min(1),
  difficulty: z.nativeEnum(QuestionDifficulty),
  tags: z.array(z.string()),
});

// Response schemas

export const questionOptionSchema = z.object({
  text: z.string(),
  isCorrect: z.boolean(),
});

export const questionDocumentSchema = z.object({
  text: z.string(),
  imageUrl: z.null(),
  options: z.array(questionOptionSchema),
  difficulty: z.nativeEnum(QuestionDifficulty),
  subject: z.string().nullable(),
  tags: z.array(z.string()),
});

export const generatedQuestionResultSchema = z.object({
  question_data: questionDocumentSchema,
  explanation: z.string(),
});
