import { LLMProviderName } from './types';

/** Every provider in the failover chain failed (or was circuit-broken) */
export class AllProvidersFailedError extends Error {
  constructor(
    readonly attempted: LLMProviderName[],
    readonly lastError?: Error,
  ) {
    super(`All LLM providers failed. Last error: ${lastError?.message ?? 'no provider attempted'}`);
    this.name = 'AllProvidersFailedError';
  }
}
