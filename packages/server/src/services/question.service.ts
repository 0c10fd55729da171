import {
  MCQ_OPTION_KEYS,
  QUESTION_LLM_TIMEOUT_MS,
  SUBJECT_ID_MAP,
  extractedMetadataSchema,
  mcqQuestionSchema,
  type ExtractedMetadata,
  type GeneratedQuestionResult,
  type McqQuestion,
  type QuestionDocument,
  type QuestionGenerationRequest,
} from '@coursewright/shared';

import type { TaskContext } from '../jobs/taskEnvelope.js';
import { buildMcqRequest } from '../prompts/question/mcq.prompt.js';
import { buildMetadataRequest } from '../prompts/question/metadata.prompt.js';
import { sanitizeForPrompt, logSuspiciousPatterns } from '../utils/sanitize.utils.js';
import { ok, type Result } from '../utils/result.js';
import { completeStructured } from './llm.service.js';

// ---------------------------------------------------------------------------
// Transform
// ---------------------------------------------------------------------------

export const lookupSubjectId = (subject: string): string | null =>
  Object.hasOwn(SUBJECT_ID_MAP, subject) ? SUBJECT_ID_MAP[subject] : null;

/** Maps a validated MCQ and its metadata into the question-bank document. */
export const toQuestionDocument = (
  mcq: McqQuestion,
  metadata: ExtractedMetadata,
): QuestionDocument => ({
  text: mcq.question,
  imageUrl: null,
  options: MCQ_OPTION_KEYS.map((key) => ({
    text: mcq.options[key],
    isCorrect: key === mcq.correct_answer,
  })),
  difficulty: metadata.difficulty,
  subject: lookupSubjectId(metadata.subject),
  tags: metadata.tags,
});

// ---------------------------------------------------------------------------
// Workflow
// ---------------------------------------------------------------------------

/**
 * Generates one MCQ and its metadata. All-or-nothing: the first step that
 * fails ends the attempt with its failure, and the job envelope retries.
 */
export const generateQuestion = async (
  payload: QuestionGenerationRequest,
  ctx: TaskContext,
): Promise<Result<GeneratedQuestionResult>> => {
  const query = sanitizeForPrompt(payload.query);
  logSuspiciousPatterns(query, 'query');

  const mcq = await completeStructured(
    ctx.gateway,
    buildMcqRequest(query),
    mcqQuestionSchema,
    QUESTION_LLM_TIMEOUT_MS,
  );
  if (!mcq.ok) {
    ctx.logger.warn({ failure: mcq.failure }, 'MCQ generation failed');
    return mcq;
  }

  const metadata = await completeStructured(
    ctx.gateway,
    buildMetadataRequest(query),
    extractedMetadataSchema,
    QUESTION_LLM_TIMEOUT_MS,
  );
  if (!metadata.ok) {
    ctx.logger.warn({ failure: metadata.failure }, 'Metadata extraction failed');
    return metadata;
  }

  const document = toQuestionDocument(mcq.value, metadata.value);
  if (document.subject === null) {
    ctx.logger.warn({ subject: metadata.value.subject }, 'Unmapped subject, leaving identifier empty');
  }

  ctx.logger.info(
    { difficulty: document.difficulty, tags: document.tags.length },
    'Question generated',
  );
  return ok({ question_data: document, explanation: mcq.value.explanation });
};
