export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 15 * 1000;
export const SKETCH_PROMPT_RETRY_DELAY_MS = 10 * 1000;

// Completed and failed results are retained for 24 hours, then read as unknown.
export const JOB_RESULT_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_WORKER_CONCURRENCY = 4;

// Per-call LLM timeouts. The learning path issues O(topics × concepts) calls,
// each carrying the accumulated knowledge base, so it gets the longest budget.
export const LEARNING_PATH_LLM_TIMEOUT_MS = 300 * 1000;
export const QUESTION_LLM_TIMEOUT_MS = 120 * 1000;
export const SKETCH_PROMPT_LLM_TIMEOUT_MS = 60 * 1000;
export const ASK_LLM_TIMEOUT_MS = 60 * 1000;

export const RATE_LIMIT_TASK_SUBMISSIONS_PER_MINUTE = 20;

export const TOPIC_MAX_LENGTH = 200;
export const QUERY_MAX_LENGTH = 2000;
export const PROMPT_MAX_LENGTH = 20000;
