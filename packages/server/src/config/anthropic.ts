import Anthropic from '@anthropic-ai/sdk';

// A client is built per job from that job's settings snapshot rather than
// shared as a module singleton. SDK-level retries are off: the job envelope
// owns the retry policy. Tests mock this module in src/__tests__/setup.ts.
export const createAnthropicClient = (apiKey: string): Anthropic =>
  new Anthropic({ apiKey, maxRetries: 0 });
