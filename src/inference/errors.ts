import { InferenceStage } from '../llm/types';

/**
 * - `transient`: timeouts, rate limits, 5xx; already retried before surfacing
 * - `malformed`: the model answered but the answer is unusable; never retried
 * - `provider`: non-transient provider failure (auth, bad request, outage)
 */
export type InferenceErrorKind = 'transient' | 'malformed' | 'provider';

export class InferenceError extends Error {
  constructor(
    readonly kind: InferenceErrorKind,
    readonly stage: InferenceStage,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'InferenceError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof InferenceError) return `${err.kind}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}
