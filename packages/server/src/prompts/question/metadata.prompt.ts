import { OutputMode, Subject } from '@coursewright/shared';
import type { LlmRequest } from '../../services/llm.gateway.js';
import { LLM_MODEL, LLM_METADATA_TEMPERATURE } from '../constants.js';

const SUBJECTS = Object.values(Subject)
  .map((s) => `"${s}"`)
  .join(', ');

export const METADATA_SYSTEM_PROMPT = `You are an assistant that analyzes a user's query for creating an exam question and extracts structured metadata.

1. Subject: determine the primary subject of the query. It must be one of: ${SUBJECTS}.
2. Difficulty: map "JEE Mains" or "NEET" to "medium" and "JEE Advanced" to "hard". If no level is given, use "medium". Allowed values: "easy", "medium", "hard".
3. Tags: pick 2-4 key technical terms from the query to use as search tags.

Respond with ONLY a single raw JSON object:
{ "subject": "Physics", "difficulty": "medium", "tags": ["tag1", "tag2"] }`;

export const buildMetadataRequest = (query: string): LlmRequest => ({
  systemInstruction: METADATA_SYSTEM_PROMPT,
  userContent: query,
  outputMode: OutputMode.STRUCTURED_JSON,
  model: LLM_MODEL,
  temperature: LLM_METADATA_TEMPERATURE,
});
