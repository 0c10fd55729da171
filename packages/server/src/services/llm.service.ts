import type { ZodType, ZodTypeDef } from 'zod';
import { FailureKind } from '@coursewright/shared';
import type { LlmGateway, LlmRequest } from './llm.gateway.js';
import { validateJson } from '../utils/jsonValidation.utils.js';
import { fail, failureFromError, ok, type Result } from '../utils/result.js';

/**
 * Issues a free_text request. Gateway rejections become transport failures
 * (or configuration failures when the gateway reports one); nothing throws.
 */
export const completeText = async (
  gateway: LlmGateway,
  request: LlmRequest,
  timeoutMs: number,
): Promise<Result<string>> => {
  try {
    const text = await gateway.complete(request, { timeoutMs });
    return ok(text);
  } catch (err) {
    const failure = failureFromError(err);
    // Anything the gateway throws that is not one of our own errors still
    // happened while talking to the provider.
    return fail(
      failure.kind === FailureKind.INTERNAL ? { ...failure, kind: FailureKind.TRANSPORT } : failure,
    );
  }
};

/** Issues a structured_json request and validates the reply against `schema`. */
export const completeStructured = async <T>(
  gateway: LlmGateway,
  request: LlmRequest,
  schema: ZodType<T, ZodTypeDef, unknown>,
  timeoutMs: number,
): Promise<Result<T>> => {
  const completion = await completeText(gateway, request, timeoutMs);
  if (!completion.ok) return completion;
  return validateJson(completion.value, schema);
};
