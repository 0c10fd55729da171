import {
  LEARNING_PATH_LLM_TIMEOUT_MS,
  FailureKind,
  learningPathSkeletonSchema,
  sourceListSchema,
  topicDetailsSchema,
  conceptContentSchema,
  type Concept,
  type ConceptContent,
  type LearningPathRequest,
  type LearningPathResult,
  type Topic,
  type TopicDetails,
} from '@coursewright/shared';

import type { TaskContext } from '../jobs/taskEnvelope.js';
import { buildSourceSearchRequest } from '../prompts/learningPath/search.prompt.js';
import { buildSkeletonRequest } from '../prompts/learningPath/skeleton.prompt.js';
import { buildSourceSummaryRequest } from '../prompts/learningPath/summary.prompt.js';
import {
  buildTopicDetailsRequest,
  buildConceptContentRequest,
} from '../prompts/learningPath/elaboration.prompt.js';
import { sanitizeForPrompt, logSuspiciousPatterns } from '../utils/sanitize.utils.js';
import { fail, ok, type Result } from '../utils/result.js';
import { completeStructured, completeText } from './llm.service.js';
import { KnowledgeBase } from './knowledgeBase.js';

// The learning path runs five steps in a fixed order:
//
//   1. SourceDiscovery      non-fatal  → [] on any failure
//   2. SkeletonGeneration   FATAL      → job attempt fails
//   3. KnowledgeAcquisition per URL    → failed URL contributes nothing
//   4. TopicElaboration     per node   → failed node keeps its empty fields
//   5. Finalize
//
// Everything is sequential: the knowledge base order follows the source
// order and nodes are elaborated in skeleton order.

export interface ChapterOutline {
  chapter: string;
  topics: Topic[];
}

export interface PipelineFillSummary {
  topics: number;
  topicsWithDetails: number;
  concepts: number;
  conceptsWithContent: number;
  mcqs: number;
}

const TIMEOUT_MS = LEARNING_PATH_LLM_TIMEOUT_MS;

// --- Step 1: SourceDiscovery ---

export const discoverSources = async (
  request: LearningPathRequest,
  ctx: TaskContext,
): Promise<string[]> => {
  const result = await completeStructured(
    ctx.gateway,
    buildSourceSearchRequest(request.topic, request.detail_level),
    sourceListSchema,
    TIMEOUT_MS,
  );
  if (!result.ok) {
    ctx.logger.warn({ failure: result.failure }, 'Source discovery failed, continuing without sources');
    return [];
  }
  ctx.logger.info({ sources: result.value.urls.length }, 'Sources discovered');
  return result.value.urls;
};

// --- Step 2: SkeletonGeneration ---

const emptyConcept = (concept: Concept): Concept => ({
  concept_name: concept.concept_name,
  reading_material: '',
  mcqs: [],
});

const emptyTopic = (topic: Topic): Topic => ({
  topic_name: topic.topic_name,
  prerequisites: [],
  problem_solving_tips: [],
  common_pitfalls: [],
  concepts: topic.concepts.map(emptyConcept),
});

/**
 * Generates the chapter outline. Leaf fields the model filled in anyway are
 * reset, so every leaf is populated by elaboration or stays at its default.
 */
export const generateSkeleton = async (
  request: LearningPathRequest,
  ctx: TaskContext,
): Promise<Result<ChapterOutline>> => {
  const result = await completeStructured(
    ctx.gateway,
    buildSkeletonRequest(request.topic, request.detail_level),
    learningPathSkeletonSchema,
    TIMEOUT_MS,
  );
  if (!result.ok) {
    ctx.logger.error({ failure: result.failure }, 'Skeleton generation failed, aborting');
    return result;
  }

  const [chapter] = Object.keys(result.value);
  const topics = chapter === undefined ? undefined : result.value[chapter];
  if (chapter === undefined || topics === undefined) {
    return fail({ kind: FailureKind.SCHEMA, message: 'Skeleton must contain a chapter key' });
  }

  ctx.logger.info({ chapter, topics: topics.length }, 'Skeleton generated');
  return ok({ chapter, topics: topics.map(emptyTopic) });
};

// --- Step 3: KnowledgeAcquisition ---

export const acquireKnowledge = async (
  urls: readonly string[],
  ctx: TaskContext,
): Promise<KnowledgeBase> => {
  if (urls.length === 0) {
    ctx.logger.info('No sources found, relying on model knowledge');
    return KnowledgeBase.empty();
  }

  let knowledgeBase = KnowledgeBase.empty();
  for (const [index, url] of urls.entries()) {
    const result = await completeText(ctx.gateway, buildSourceSummaryRequest(url), TIMEOUT_MS);
    if (!result.ok) {
      ctx.logger.warn({ url, failure: result.failure }, 'Failed to summarize source, skipping');
      continue;
    }
    knowledgeBase = knowledgeBase.append(url, result.value);
    ctx.logger.info({ url, position: index + 1, of: urls.length }, 'Source summarized');
  }

  ctx.logger.info(
    { sources: knowledgeBase.entries.length, length: knowledgeBase.render().length },
    'Knowledge base built',
  );
  return knowledgeBase;
};

// --- Step 4: TopicElaboration ---

export const elaborateTopic = async (
  chapterTopic: string,
  topicName: string,
  knowledgeBase: KnowledgeBase,
  ctx: TaskContext,
): Promise<TopicDetails | null> => {
  const result = await completeStructured(
    ctx.gateway,
    buildTopicDetailsRequest(chapterTopic, topicName, knowledgeBase.toPromptContext()),
    topicDetailsSchema,
    TIMEOUT_MS,
  );
  if (!result.ok) {
    ctx.logger.warn({ topicName, failure: result.failure }, 'Topic details rejected, keeping defaults');
    return null;
  }
  return result.value;
};

export const elaborateConcept = async (
  topicName: string,
  conceptName: string,
  knowledgeBase: KnowledgeBase,
  ctx: TaskContext,
): Promise<ConceptContent | null> => {
  const result = await completeStructured(
    ctx.gateway,
    buildConceptContentRequest(topicName, conceptName, knowledgeBase.toPromptContext()),
    conceptContentSchema,
    TIMEOUT_MS,
  );
  if (!result.ok) {
    ctx.logger.warn(
      { topicName, conceptName, failure: result.failure },
      'Concept content rejected, keeping defaults',
    );
    return null;
  }
  return result.value;
};

// Patches replace the targeted fields wholesale, so applying the same patch
// twice yields the same node.
export const applyTopicDetails = (topic: Topic, details: TopicDetails): Topic => ({
  ...topic,
  prerequisites: [...details.prerequisites],
  problem_solving_tips: [...details.problem_solving_tips],
  common_pitfalls: [...details.common_pitfalls],
});

export const applyConceptContent = (concept: Concept, content: ConceptContent): Concept => ({
  ...concept,
  reading_material: content.reading_material,
  mcqs: content.mcqs.map((mcq) => ({ ...mcq, options: [...mcq.options] })),
});

/**
 * Fills every topic, then each of its concepts, in skeleton order. The input
 * outline is left untouched; the returned list is a new tree owned by the caller.
 */
export const elaborateTopics = async (
  chapterTopic: string,
  topics: readonly Topic[],
  knowledgeBase: KnowledgeBase,
  ctx: TaskContext,
): Promise<Topic[]> => {
  const filled: Topic[] = [];

  for (const topic of topics) {
    ctx.logger.info({ topicName: topic.topic_name }, 'Elaborating topic');
    const details = await elaborateTopic(chapterTopic, topic.topic_name, knowledgeBase, ctx);
    const withDetails = details ? applyTopicDetails(topic, details) : topic;

    const concepts: Concept[] = [];
    for (const concept of topic.concepts) {
      const content = await elaborateConcept(
        topic.topic_name,
        concept.concept_name,
        knowledgeBase,
        ctx,
      );
      concepts.push(content ? applyConceptContent(concept, content) : concept);
    }

    filled.push({ ...withDetails, concepts });
  }

  return filled;
};

// --- Step 5: Finalize ---

export const summarizePipelineFill = (result: LearningPathResult): PipelineFillSummary => {
  const concepts = result.content.flatMap((t) => t.concepts);
  return {
    topics: result.content.length,
    topicsWithDetails: result.content.filter(
      (t) =>
        t.prerequisites.length > 0 ||
        t.problem_solving_tips.length > 0 ||
        t.common_pitfalls.length > 0,
    ).length,
    concepts: concepts.length,
    conceptsWithContent: concepts.filter((c) => c.reading_material.length > 0 || c.mcqs.length > 0)
      .length,
    mcqs: concepts.reduce((sum, c) => sum + c.mcqs.length, 0),
  };
};

/** Entry point of the create-learning-path task. */
export const createLearningPath = async (
  payload: LearningPathRequest,
  ctx: TaskContext,
): Promise<Result<LearningPathResult>> => {
  const topic = sanitizeForPrompt(payload.topic);
  logSuspiciousPatterns(topic, 'topic');
  const request: LearningPathRequest = { ...payload, topic };

  ctx.logger.info({ topic, detailLevel: request.detail_level }, 'Starting learning path generation');

  const urls = await discoverSources(request, ctx);

  const outline = await generateSkeleton(request, ctx);
  if (!outline.ok) return outline;

  const knowledgeBase = await acquireKnowledge(urls, ctx);
  const content = await elaborateTopics(request.topic, outline.value.topics, knowledgeBase, ctx);

  const result: LearningPathResult = { topic: outline.value.chapter, content };
  ctx.logger.info(summarizePipelineFill(result), 'Learning path generated');
  return ok(result);
};
