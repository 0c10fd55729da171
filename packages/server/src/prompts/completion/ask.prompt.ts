import { OutputMode } from '@coursewright/shared';
import type { LlmRequest } from '../../services/llm.gateway.js';
import { LLM_DEFAULT_ASK_MODEL } from '../constants.js';

export const buildAskRequest = (prompt: string, model?: string): LlmRequest => ({
  userContent: prompt,
  outputMode: OutputMode.FREE_TEXT,
  model: model ?? LLM_DEFAULT_ASK_MODEL,
});
