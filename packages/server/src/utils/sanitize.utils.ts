import pino from 'pino';

// Exported so tests can vi.spyOn(logger, 'warn')
export const logger = pino({ name: 'sanitize' });

/**
 * Strips control characters and zero-width unicode from a string.
 * Tab, newline and carriage return are kept.
 */
export const sanitizeString = (input: string): string => {
  return (
    input
      // eslint-disable-next-line no-control-regex
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
      .replace(/[\u200B-\u200F\u2028-\u202F\u205F-\u206F\uFEFF]/g, '')
  );
};

/**
 * Normalises caller text (topic, query, raw prompt, question and explanation)
 * before it is embedded in an LLM request.
 */
export const sanitizeForPrompt = (input: string): string => {
  return sanitizeString(input)
    .replace(/\u00AD/g, '')       // soft hyphen
    .replace(/\n{3,}/g, '\n\n')
    .trim();
};

const SUSPICIOUS_PATTERNS = [
  /ignore\s+(previous|above|all)\s+instructions/i,
  /forget\s+(previous|all)\s+instructions/i,
  /system\s+prompt/i,
  /\[INST\]/i,
  /<\|im_start\|>/i,
  /###\s*(system|instruction)/i,
  /respond\s+with\s+(?:anything|something)\s+other\s+than\s+json/i,
];

/**
 * Logs a warning when caller text looks like a prompt injection attempt.
 * The text is still used; this only leaves a trace for review.
 */
export const logSuspiciousPatterns = (input: string, fieldName: string): void => {
  const match = SUSPICIOUS_PATTERNS.find((pattern) => pattern.test(input));
  if (match) {
    logger.warn(
      { fieldName, pattern: match.toString() },
      'Suspicious pattern detected in task input',
    );
  }
};
