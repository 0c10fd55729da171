import { OutputMode } from '@coursewright/shared';
import type { LlmRequest } from '../../services/llm.gateway.js';
import { EXAM_NAME, LLM_RESEARCH_MODEL } from '../constants.js';

export const buildSourceSummaryRequest = (url: string): LlmRequest => ({
  userContent: `Visit and provide a detailed summary of the key academic points from this page, focusing on formulas, definitions, and core principles relevant to ${EXAM_NAME} Physics/Chemistry/Maths: ${url}`,
  outputMode: OutputMode.FREE_TEXT,
  model: LLM_RESEARCH_MODEL,
});
