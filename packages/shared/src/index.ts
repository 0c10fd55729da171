// Enums
export {
  JobStatus,
  NativeJobState,
  TaskName,
  DetailLevel,
  OutputMode,
  QuestionDifficulty,
  Subject,
  FailureKind,
  ErrorCode,
} from './enums/index.js';

// Constants
export {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  SKETCH_PROMPT_RETRY_DELAY_MS,
  JOB_RESULT_TTL_MS,
  DEFAULT_WORKER_CONCURRENCY,
  LEARNING_PATH_LLM_TIMEOUT_MS,
  QUESTION_LLM_TIMEOUT_MS,
  SKETCH_PROMPT_LLM_TIMEOUT_MS,
  ASK_LLM_TIMEOUT_MS,
  RATE_LIMIT_TASK_SUBMISSIONS_PER_MINUTE,
  TOPIC_MAX_LENGTH,
  QUERY_MAX_LENGTH,
  PROMPT_MAX_LENGTH,
} from './constants/job.constants.js';

export {
  MCQ_OPTION_KEYS,
  MIN_MCQ_OPTIONS,
  SUBJECT_ID_MAP,
  NO_WEB_CONTEXT_MARKER,
  EMPTY_SUMMARY_PLACEHOLDER,
} from './constants/content.constants.js';

// Schemas
export { apiErrorSchema } from './schemas/common.schema.js';

export {
  jobParamsSchema,
  jobStatusResponseSchema,
  syncTaskResponseSchema,
  asyncTaskResponseSchema,
  queueStatsSchema,
  healthResponseSchema,
  nativeJobStateSchema,
} from './schemas/job.schema.js';

export {
  learningPathRequestSchema,
  sourceListSchema,
  mcqSchema,
  conceptSchema,
  topicSchema,
  learningPathSkeletonSchema,
  topicDetailsSchema,
  conceptContentSchema,
  learningPathResultSchema,
} from './schemas/learningPath.schema.js';

export {
  questionGenerationRequestSchema,
  mcqOptionKeySchema,
  mcqOptionsSchema,
  mcqQuestionSchema,
  extractedMetadataSchema,
  questionOptionSchema,
  questionDocumentSchema,
  generatedQuestionResultSchema,
} from './schemas/question.schema.js';

export {
  askLlmRequestSchema,
  sketchPromptRequestSchema,
  sketchPromptResultSchema,
} from './schemas/completion.schema.js';

// Types
export type { ApiErrorResponse } from './types/api.types.js';

export type {
  JobParams,
  JobStatusResponse,
  SyncTaskResponse,
  AsyncTaskResponse,
  QueueStats,
  HealthResponse,
  LearningPathRequest,
  SourceList,
  Mcq,
  Concept,
  Topic,
  LearningPathSkeleton,
  TopicDetails,
  ConceptContent,
  LearningPathResult,
  QuestionGenerationRequest,
  McqOptionKey,
  McqQuestion,
  ExtractedMetadata,
  QuestionOption,
  QuestionDocument,
  GeneratedQuestionResult,
  AskLlmRequest,
  SketchPromptRequest,
  SketchPromptResult,
} from './types/index.js';
