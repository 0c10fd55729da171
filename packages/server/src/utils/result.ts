import { FailureKind } from '@coursewright/shared';

export interface StepFailure {
  kind: FailureKind;
  message: string;
  /** Short excerpt of the offending model output, for logs only. */
  snippet?: string;
  issues?: string[];
}

export type Result<T> = { ok: true; value: T } | { ok: false; failure: StepFailure };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(failure: StepFailure): Result<T> => ({ ok: false, failure });

/**
 * Renders a failure as the human-readable string stored as a failed job's
 * result, e.g. "schema: options.B: Required".
 */
export const describeFailure = (failure: StepFailure): string => {
  const detail = failure.issues && failure.issues.length > 0
    ? failure.issues.join('; ')
    : failure.message;
  return `${failure.kind}: ${detail}`;
};

const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/** Classifies a thrown value into a failure, keeping kinds set by our own error classes. */
export const failureFromError = (err: unknown): StepFailure => {
  if (err instanceof Error && 'kind' in err) {
    const kind = Object.values(FailureKind).find((k) => k === err.kind);
    if (kind) return { kind, message: err.message };
  }
  return { kind: FailureKind.INTERNAL, message: errorMessage(err) };
};
