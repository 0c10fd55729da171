import { OutputMode, type DetailLevel } from '@coursewright/shared';
import type { LlmRequest } from '../../services/llm.gateway.js';
import { EXAM_NAME, LLM_RESEARCH_MODEL } from '../constants.js';

export const buildSourceSearchRequest = (topic: string, detailLevel: DetailLevel): LlmRequest => ({
  userContent: `Find 3-4 highly authoritative URLs for learning about "${topic}" for the Indian ${EXAM_NAME} ${detailLevel} syllabus. Focus on academic or reputable educational sites.
Return ONLY a single JSON object with a key "urls" containing an array of the URLs, like {"urls": ["https://...", "https://..."]}.`,
  outputMode: OutputMode.STRUCTURED_JSON,
  model: LLM_RESEARCH_MODEL,
});
