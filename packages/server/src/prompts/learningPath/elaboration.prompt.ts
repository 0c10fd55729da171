import { OutputMode } from '@coursewright/shared';
import type { LlmRequest } from '../../services/llm.gateway.js';
import { EXAM_NAME, LLM_MODEL } from '../constants.js';

// `context` is the rendered knowledge base, or the no-context marker when
// no source could be summarised.

export const buildTopicDetailsRequest = (
  chapterTopic: string,
  topicName: string,
  context: string,
): LlmRequest => ({
  userContent: `Based on the context below, generate details for the ${EXAM_NAME} topic "${topicName}" within the chapter "${chapterTopic}".
CONTEXT: ${context}
---
Generate a single JSON object with exactly these keys, each an array of strings: "prerequisites", "problem_solving_tips", "common_pitfalls".`,
  outputMode: OutputMode.STRUCTURED_JSON,
  model: LLM_MODEL,
});

export const buildConceptContentRequest = (
  topicName: string,
  conceptName: string,
  context: string,
): LlmRequest => ({
  systemInstruction: `Act as a master teacher for ${EXAM_NAME}.`,
  userContent: `Use the context below to generate content for the concept "${conceptName}" under the topic "${topicName}".
CONTEXT: ${context}
---
Generate a single JSON object with two keys: "reading_material" (string) and "mcqs" (an array of MCQ objects).
Each MCQ object must have: "question" (string), "options" (array of strings), "correct_answer_index" (zero-based integer index into options), and "explanation" (string).`,
  outputMode: OutputMode.STRUCTURED_JSON,
  model: LLM_MODEL,
});
