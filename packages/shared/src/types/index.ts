import type { z } from 'zod';

// Jobs
import type {
  jobParamsSchema,
  jobStatusResponseSchema,
  syncTaskResponseSchema,
  asyncTaskResponseSchema,
  queueStatsSchema,
  healthResponseSchema,
} from '../schemas/job.schema.js';

export type JobParams = z.infer<typeof jobParamsSchema>;
export type JobStatusResponse = z.infer<typeof jobStatusResponseSchema>;
export type SyncTaskResponse = z.infer<typeof syncTaskResponseSchema>;
export type AsyncTaskResponse = z.infer<typeof asyncTaskResponseSchema>;
export type QueueStats = z.infer<typeof queueStatsSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;

// Learning path
import type {
  learningPathRequestSchema,
  sourceListSchema,
  mcqSchema,
  conceptSchema,
  topicSchema,
  learningPathSkeletonSchema,
  topicDetailsSchema,
  conceptContentSchema,
  learningPathResultSchema,
} from '../schemas/learningPath.schema.js';

export type LearningPathRequest = z.infer<typeof learningPathRequestSchema>;
export type SourceList = z.infer<typeof sourceListSchema>;
export type Mcq = z.infer<typeof mcqSchema>;
export type Concept = z.infer<typeof conceptSchema>;
export type Topic = z.infer<typeof topicSchema>;
export type LearningPathSkeleton = z.infer<typeof learningPathSkeletonSchema>;
export type TopicDetails = z.infer<typeof topicDetailsSchema>;
export type ConceptContent = z.infer<typeof conceptContentSchema>;
export type LearningPathResult = z.infer<typeof learningPathResultSchema>;

// Question generation
import type {
  questionGenerationRequestSchema,
  mcqOptionKeySchema,
  mcqQuestionSchema,
  extractedMetadataSchema,
  questionOptionSchema,
  questionDocumentSchema,
  generatedQuestionResultSchema,
} from '../schemas/question.schema.js';

export type QuestionGenerationRequest = z.infer<typeof questionGenerationRequestSchema>;
export type McqOptionKey = z.infer<typeof mcqOptionKeySchema>;
export type McqQuestion = z.infer<typeof mcqQuestionSchema>;
export type ExtractedMetadata = z.infer<typeof extractedMetadataSchema>;
export type QuestionOption = z.infer<typeof questionOptionSchema>;
export type QuestionDocument = z.infer<typeof questionDocumentSchema>;
export type GeneratedQuestionResult = z.infer<typeof generatedQuestionResultSchema>;

// Completions
import type {
  askLlmRequestSchema,
  sketchPromptRequestSchema,
  sketchPromptResultSchema,
} from '../schemas/completion.schema.js';

export type AskLlmRequest = z.infer<typeof askLlmRequestSchema>;
export type SketchPromptRequest = z.infer<typeof sketchPromptRequestSchema>;
export type SketchPromptResult = z.infer<typeof sketchPromptResultSchema>;
