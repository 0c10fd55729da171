import {
  ASK_LLM_TIMEOUT_MS,
  FailureKind,
  SKETCH_PROMPT_LLM_TIMEOUT_MS,
  type AskLlmRequest,
  type SketchPromptRequest,
  type SketchPromptResult,
} from '@coursewright/shared';

import type { TaskContext } from '../jobs/taskEnvelope.js';
import { buildAskRequest } from '../prompts/completion/ask.prompt.js';
import { buildSketchPromptRequest } from '../prompts/completion/sketch.prompt.js';
import { sanitizeForPrompt, logSuspiciousPatterns } from '../utils/sanitize.utils.js';
import { fail, ok, type Result } from '../utils/result.js';
import { completeText } from './llm.service.js';

/** Forwards a raw prompt to the model and returns its text unchanged. */
export const askLlm = async (
  payload: AskLlmRequest,
  ctx: TaskContext,
): Promise<Result<string>> => {
  const prompt = sanitizeForPrompt(payload.prompt);
  logSuspiciousPatterns(prompt, 'prompt');

  const completion = await completeText(
    ctx.gateway,
    buildAskRequest(prompt, payload.model),
    ASK_LLM_TIMEOUT_MS,
  );
  if (!completion.ok) return completion;

  ctx.logger.info({ length: completion.value.length }, 'Prompt answered');
  return completion;
};

/**
 * Distils a question and its explanation into a one-sentence description of
 * the physical setup, used downstream as an image prompt.
 */
export const generateSketchPrompt = async (
  payload: SketchPromptRequest,
  ctx: TaskContext,
): Promise<Result<SketchPromptResult>> => {
  const questionText = sanitizeForPrompt(payload.question_text);
  const explanationText = sanitizeForPrompt(payload.explanation_text);
  logSuspiciousPatterns(questionText, 'question_text');
  logSuspiciousPatterns(explanationText, 'explanation_text');

  const completion = await completeText(
    ctx.gateway,
    buildSketchPromptRequest(questionText, explanationText),
    SKETCH_PROMPT_LLM_TIMEOUT_MS,
  );
  if (!completion.ok) return completion;

  const description = completion.value.trim();
  if (description.length === 0) {
    return fail({ kind: FailureKind.SCHEMA, message: 'Sketch description is empty' });
  }

  ctx.logger.info({ description }, 'Sketch prompt generated');
  return ok({ description });
};
