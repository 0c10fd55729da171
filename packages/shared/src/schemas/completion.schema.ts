import { z } from 'zod';
import { PROMPT_MAX_LENGTH } from '../constants/job.constants.js';

export const askLlmRequestSchema = z.object({
  prompt: z.string().trim().min(1, 'Prompt is required').max(PROMPT_MAX_LENGTH),
  model: z.string().trim().min(1).optional(),
});

export const sketchPromptRequestSchema = z.object({
  question_text: z.string().trim().min(1, 'Question text is required').max(PROMPT_MAX_LENGTH),
  explanation_text: z.string().trim().min(1, 'Explanation text is required').max(PROMPT_MAX_LENGTH),
});

export const sketchPromptResultSchema = z.object({
  description: z.string().min(1),
});
