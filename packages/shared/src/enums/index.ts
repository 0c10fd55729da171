export enum JobStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  UNKNOWN = 'unknown',
}

// States as tracked by the queue runtime. Translated to JobStatus at the API edge.
export enum NativeJobState {
  PENDING = 'PENDING',
  STARTED = 'STARTED',
  RETRY = 'RETRY',
  SUCCESS = 'SUCCESS',
  FAILURE = 'FAILURE',
}

export enum TaskName {
  ASK_LLM = 'ask-llm',
  CREATE_LEARNING_PATH = 'create-learning-path',
  GENERATE_QUESTION = 'generate-question',
  GENERATE_SKETCH_PROMPT = 'generate-sketch-prompt',
}

export enum DetailLevel {
  MAINS = 'mains',
  ADVANCED = 'advanced',
}

export enum OutputMode {
  FREE_TEXT = 'free_text',
  STRUCTURED_JSON = 'structured_json',
}

export enum QuestionDifficulty {
  EASY = 'easy',
  MEDIUM = 'medium',
  HARD = 'hard',
}

export enum Subject {
  PHYSICS = 'Physics',
  CHEMISTRY = 'Chemistry',
  MATHEMATICS = 'Mathematics',
}

export enum FailureKind {
  TRANSPORT = 'transport',
  PARSE = 'parse',
  SCHEMA = 'schema',
  CONFIGURATION = 'configuration',
  INTERNAL = 'internal',
}

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMITED = 'RATE_LIMITED',
  TASK_FAILED = 'TASK_FAILED',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
