import { z } from 'zod';
import { DetailLevel } from '../enums/index.js';
import { MIN_MCQ_OPTIONS } from '../constants/content.constants.js';
import { TOPIC_MAX_LENGTH } from '../constants/job.constants.js';

// Request schemas

export const learningPathRequestSchema = z.object({
  topic: z.string().trim().min(1, 'Topic is required').max(TOPIC_MAX_LENGTH),
  detail_level: z.nativeEnum(DetailLevel).default(DetailLevel.ADVANCED),
});

// LLM output validation schemas

export const sourceListSchema = z.object({
  urls: z.array(z.string().min(1)),
});

export const mcqSchema = z
  .object({
    question: z.string().min(1),
    options: z.array(z.string()).min(MIN_MCQ_OPTIONS),
    correct_answer_index: z.number().int().nonnegative(),
    explanation: z.string(),
  })
  .refine((mcq) => mcq.correct_answer_index < mcq.options.length, {
    message: 'correct_answer_index must point at one of the options',
    path: ['correct_answer_index'],
  });

// Leaf fields are empty in a freshly generated skeleton and filled in later,
// so a skeleton may omit them. When present they must have the right type.
export const conceptSchema = z.object({
  concept_name: z.string().min(1),
  reading_material: z.string().default(''),
  mcqs: z.array(mcqSchema).default([]),
});

export const topicSchema = z.object({
  topic_name: z.string().min(1),
  prerequisites: z.array(z.string()).default([]),
  problem_solving_tips: z.array(z.string()).default([]),
  common_pitfalls: z.array(z.string()).default([]),
  concepts: z.array(conceptSchema),
});

// A single root key naming the chapter, holding the ordered topic list.
export const learningPathSkeletonSchema = z
  .record(z.string(), z.array(topicSchema))
  .refine((skeleton) => Object.keys(skeleton).length > 0, {
    message: 'Skeleton must contain a chapter key',
  });

export const topicDetailsSchema = z.object({
  prerequisites: z.array(z.string()),
  problem_solving_tips: z.array(z.string()),
  common_pitfalls: z.array(z.string()),
});

export const conceptContentSchema = z.object({
  reading_material: z.string(),
  mcqs: z.array(mcqSchema),
});

// Response schemas

export const learningPathResultSchema = z.object({
  topic: z.string(),
  content: z.array(topicSchema),
});
