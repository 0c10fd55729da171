// Main model for structure and content generation.
export const LLM_MODEL = 'claude-sonnet-4-6';

// Cheaper model for source discovery and per-source summaries, which are
// issued once per URL and only feed context into later prompts.
export const LLM_RESEARCH_MODEL = 'claude-haiku-4-5';

// Default for free-form ask-llm requests that do not name a model.
export const LLM_DEFAULT_ASK_MODEL = 'claude-haiku-4-5';

// MCQ generation varies the scenario between runs while keeping the schema
// stable; metadata extraction and sketch descriptions should be near-deterministic.
export const LLM_MCQ_TEMPERATURE = 0.5;
export const LLM_METADATA_TEMPERATURE = 0.1;
export const LLM_SKETCH_PROMPT_TEMPERATURE = 0.1;

// Appended to the system prompt of every structured_json request.
export const JSON_ONLY_INSTRUCTION =
  'Respond with ONLY a single raw JSON object. Do not wrap it in Markdown code fences and do not add any text before or after it.';

export const EXAM_NAME = 'IIT-JEE';
