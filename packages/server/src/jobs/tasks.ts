import {
  SKETCH_PROMPT_RETRY_DELAY_MS,
  TaskName,
  askLlmRequestSchema,
  learningPathRequestSchema,
  questionGenerationRequestSchema,
  sketchPromptRequestSchema,
} from '@coursewright/shared';

import type { JobSettings } from '../config/env.js';
import { createLearningPath } from '../services/learningPath.service.js';
import { generateQuestion } from '../services/question.service.js';
import { askLlm, generateSketchPrompt } from '../services/completion.service.js';
import { defineTask, type TaskDefinition } from './taskEnvelope.js';

export type TaskRegistry = Readonly<Record<TaskName, TaskDefinition>>;

type RetrySettings = Pick<JobSettings, 'maxAttempts' | 'retryDelayMs'>;

export const createTaskRegistry = (settings: RetrySettings): TaskRegistry => ({
  [TaskName.CREATE_LEARNING_PATH]: defineTask({
    name: TaskName.CREATE_LEARNING_PATH,
    payloadSchema: learningPathRequestSchema,
    maxAttempts: settings.maxAttempts,
    retryDelayMs: settings.retryDelayMs,
    run: createLearningPath,
  }),
  [TaskName.GENERATE_QUESTION]: defineTask({
    name: TaskName.GENERATE_QUESTION,
    payloadSchema: questionGenerationRequestSchema,
    maxAttempts: settings.maxAttempts,
    retryDelayMs: settings.retryDelayMs,
    run: generateQuestion,
  }),
  [TaskName.GENERATE_SKETCH_PROMPT]: defineTask({
    name: TaskName.GENERATE_SKETCH_PROMPT,
    payloadSchema: sketchPromptRequestSchema,
    maxAttempts: settings.maxAttempts,
    retryDelayMs: Math.min(settings.retryDelayMs, SKETCH_PROMPT_RETRY_DELAY_MS),
    run: generateSketchPrompt,
  }),
  [TaskName.ASK_LLM]: defineTask({
    name: TaskName.ASK_LLM,
    payloadSchema: askLlmRequestSchema,
    maxAttempts: settings.maxAttempts,
    retryDelayMs: settings.retryDelayMs,
    run: askLlm,
  }),
});
