import { OutputMode, type DetailLevel } from '@coursewright/shared';
import type { LlmRequest } from '../../services/llm.gateway.js';
import { EXAM_NAME, LLM_MODEL } from '../constants.js';

/**
 * Structure-only prompt. Source summaries are deliberately not included:
 * the chapter/topic/concept outline does not depend on them, and every
 * leaf field is filled by a later elaboration request.
 *
 * The field names below must match topicSchema and conceptSchema in
 * packages/shared/src/schemas/learningPath.schema.ts.
 */
export const buildSkeletonRequest = (topic: string, detailLevel: DetailLevel): LlmRequest => ({
  systemInstruction: `Act as an expert academic curriculum designer for ${EXAM_NAME} coaching in India.`,
  userContent: `For the topic "${topic}" targeting the "${detailLevel}" level, create a hierarchical learning path structure.
Generate a JSON object with a single root key: the chapter name. Its value is a list of "topic" objects.
Each "topic" object must have: "topic_name" (string), "prerequisites" (empty list), "problem_solving_tips" (empty list), "common_pitfalls" (empty list), and "concepts" (a list of "concept" objects).
Each "concept" object must have: "concept_name" (string), "reading_material" (empty string), and "mcqs" (empty list).
Break down "${topic}" into the logical topics and concepts essential for the ${EXAM_NAME} syllabus. Do NOT populate the empty fields.`,
  outputMode: OutputMode.STRUCTURED_JSON,
  model: LLM_MODEL,
});
