import Anthropic from '@anthropic-ai/sdk';
import { OutputMode } from '@coursewright/shared';
import { createAnthropicClient } from '../config/anthropic.js';
import type { LlmSettings } from '../config/env.js';
import { JSON_ONLY_INSTRUCTION } from '../prompts/constants.js';
import { ConfigurationError, TransportError } from '../utils/errors.js';

/** Provider-agnostic request produced by the prompt builders. */
export interface LlmRequest {
  systemInstruction?: string;
  userContent: string;
  outputMode: OutputMode;
  model: string;
  temperature?: number;
}

export interface CompletionOptions {
  timeoutMs: number;
}

/**
 * Single request/response capability used by every pipeline step.
 * Resolves with the completion text or rejects with a TransportError.
 */
export interface LlmGateway {
  complete(request: LlmRequest, options: CompletionOptions): Promise<string>;
}

export type LlmGatewayFactory = () => LlmGateway;

const PROVIDER = 'anthropic';

const buildSystemPrompt = (request: LlmRequest): string | undefined => {
  if (request.outputMode !== OutputMode.STRUCTURED_JSON) return request.systemInstruction;
  return request.systemInstruction
    ? `${request.systemInstruction}\n\n${JSON_ONLY_INSTRUCTION}`
    : JSON_ONLY_INSTRUCTION;
};

export class AnthropicGateway implements LlmGateway {
  constructor(
    private readonly client: Anthropic,
    private readonly maxTokens: number,
  ) {}

  async complete(request: LlmRequest, options: CompletionOptions): Promise<string> {
    const system = buildSystemPrompt(request);

    let text: string;
    try {
      const stream = this.client.messages.stream(
        {
          model: request.model,
          max_tokens: this.maxTokens,
          messages: [{ role: 'user', content: request.userContent }],
          ...(system !== undefined ? { system } : {}),
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        },
        { timeout: options.timeoutMs },
      );
      text = await stream.finalText();
    } catch (err) {
      const status = err instanceof Anthropic.APIError ? err.status : undefined;
      const message = err instanceof Error ? err.message : 'LLM request failed';
      throw new TransportError(message, PROVIDER, status, err);
    }

    if (text.trim().length === 0) {
      throw new TransportError('LLM returned an empty completion', PROVIDER);
    }
    return text;
  }
}

/** Builds a gateway from one job's settings snapshot. */
export const createLlmGateway = (settings: LlmSettings): LlmGateway => {
  if (!settings.apiKey) {
    throw new ConfigurationError('ANTHROPIC_API_KEY is not configured');
  }
  return new AnthropicGateway(createAnthropicClient(settings.apiKey), settings.maxTokens);
};
