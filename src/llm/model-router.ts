import {
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRouterConfig,
  ModelRoutingContext,
} from './types';
import { AllProvidersFailedError } from './errors';
import { logger } from '../observability/logger';

const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60_000;

interface CircuitBreakerState {
  failures: number;
  openUntil: number;
}

/**
 * Model Router: decides which LLM provider serves each inference call.
 *
 * Routing strategies:
 * - **config**: primary, then secondary, then tertiary (default)
 * - **stage**: classification and ranking may be pinned to different providers
 * - **ab_test**: deterministic hash of the message id splits traffic between
 *   primary and secondary, so a rerun over the same messages routes identically
 *
 * Includes per-provider circuit breakers and automatic failover.
 */
export class ModelRouter {
  private providers: Map<LLMProviderName, LLMProvider>;
  private config: ModelRouterConfig;
  private circuitBreakers: Map<LLMProviderName, CircuitBreakerState>;
  private now: () => number;
  private log = logger.child({ component: 'model-router' });

  constructor(
    config: ModelRouterConfig,
    providers: Map<LLMProviderName, LLMProvider>,
    now: () => number = Date.now,
  ) {
    this.config = config;
    this.providers = providers;
    this.circuitBreakers = new Map();
    this.now = now;

    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
        `Configured providers: ${Array.from(providers.keys()).join(', ')}`,
      );
    }

    this.log.info({
      primary: config.primaryProvider,
      secondary: config.secondaryProvider,
      tertiary: config.tertiaryProvider,
      strategy: config.strategy,
      availableProviders: Array.from(providers.keys()),
    }, 'Model router initialized');
  }

  /**
   * Route a completion request to the appropriate provider(s) with failover.
   */
  async complete(
    request: LLMCompletionRequest,
    context: ModelRoutingContext,
  ): Promise<LLMCompletionResponse> {
    const providerOrder = this.resolveProviderOrder(context);
    const attempted: LLMProviderName[] = [];
    let lastError: Error | undefined;

    for (const providerName of providerOrder) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      const cb = this.circuitBreakers.get(providerName);
      if (cb && this.now() < cb.openUntil) {
        this.log.debug({ provider: providerName }, 'Circuit breaker open, skipping');
        continue;
      }

      attempted.push(providerName);
      try {
        const response = await provider.complete(request);
        this.resetCircuitBreaker(providerName);

        if (attempted.length > 1) {
          this.log.info(
            { from: attempted[attempted.length - 2], to: providerName, messageId: context.messageId },
            'Successful failover to secondary provider',
          );
        }

        return response;
      } catch (err) {
        this.recordFailure(providerName);
        lastError = err instanceof Error ? err : new Error(String(err));

        this.log.warn(
          {
            provider: providerName,
            stage: context.stage,
            messageId: context.messageId,
            err: lastError.message,
            attempt: attempted.length,
            total: providerOrder.length,
          },
          'Provider failed, trying next',
        );
      }
    }

    throw new AllProvidersFailedError(attempted, lastError);
  }

  /**
   * True when every configured provider is circuit-broken (complete outage).
   */
  isFullyOpen(): boolean {
    const now = this.now();
    for (const [name] of this.providers) {
      const cb = this.circuitBreakers.get(name);
      if (!cb || now >= cb.openUntil) return false;
    }
    return true;
  }

  /**
   * Ordered list of providers to try for this request.
   */
  resolveProviderOrder(context: ModelRoutingContext): LLMProviderName[] {
    const order: LLMProviderName[] = [];

    switch (this.config.strategy) {
      case 'stage': {
        const stageProvider = this.config.stageRouting?.[context.stage];
        if (stageProvider && this.providers.has(stageProvider)) {
          order.push(stageProvider);
        }
        break;
      }

      case 'ab_test': {
        const bucket = this.simpleHash(context.messageId) % 100;

        if (bucket < this.config.abTestSplit) {
          order.push(this.config.primaryProvider);
          if (this.config.secondaryProvider) order.push(this.config.secondaryProvider);
        } else {
          if (this.config.secondaryProvider) order.push(this.config.secondaryProvider);
          order.push(this.config.primaryProvider);
        }
        break;
      }

      case 'config':
        break;
    }

    // Always ensure the full failover chain is present
    for (const name of [this.config.primaryProvider, this.config.secondaryProvider, this.config.tertiaryProvider]) {
      if (name && !order.includes(name)) order.push(name);
    }

    return order;
  }

  // ─── Private ──────────────────────────────────────────────────

  private recordFailure(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider) ?? { failures: 0, openUntil: 0 };
    cb.failures++;

    if (cb.failures >= CIRCUIT_BREAKER_THRESHOLD) {
      cb.openUntil = this.now() + CIRCUIT_BREAKER_RESET_MS;
      this.log.error(
        { provider, failures: cb.failures, resetMs: CIRCUIT_BREAKER_RESET_MS },
        'Circuit breaker opened for provider',
      );
    }

    this.circuitBreakers.set(provider, cb);
  }

  private resetCircuitBreaker(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider);
    if (cb) {
      cb.failures = 0;
      cb.openUntil = 0;
    }
  }

  private simpleHash(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      hash = ((hash << 5) - hash) + str.charCodeAt(i);
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash);
  }
}
