import { AllProvidersFailedError } from './errors';

const TRANSIENT_STATUS = new Set([408, 409, 429]);
const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET']);
const TRANSIENT_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError', 'AbortError', 'TimeoutError']);
const TRANSIENT_MESSAGE = /timed? ?out|rate limit|quota|overloaded|resource[_ ]exhausted|\b(429|500|502|503|504)\b/i;

export interface RetryOptions {
  /** Retries after the first attempt */
  retries: number;
  /** Delay before the first retry; doubles each time */
  baseDelayMs: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `operation`, retrying retryable failures with exponential backoff
 * (base, 2×base, 4×base…). Non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (attempt >= options.retries || !isRetryable(err)) {
        throw err;
      }
      const delayMs = options.baseDelayMs * Math.pow(2, attempt);
      options.onRetry?.(err, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}

/**
 * Timeouts, rate limits, quota signals, 5xx responses and dropped connections
 * are transient. Anything else (auth errors, bad requests, malformed output) is not.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof AllProvidersFailedError) {
    return err.lastError !== undefined && isTransientError(err.lastError);
  }
  if (typeof err !== 'object' || err === null) return false;

  const status = 'status' in err && typeof err.status === 'number' ? err.status : undefined;
  if (status !== undefined) {
    return TRANSIENT_STATUS.has(status) || status >= 500;
  }

  if ('code' in err && typeof err.code === 'string' && TRANSIENT_CODES.has(err.code)) return true;
  if (err instanceof Error) {
    if (TRANSIENT_NAMES.has(err.name)) return true;
    return TRANSIENT_MESSAGE.test(err.message);
  }
  return false;
}
