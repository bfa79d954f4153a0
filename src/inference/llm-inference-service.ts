import { ProductCategory } from '../catalog/categories';
import { ModelRouter } from '../llm/model-router';
import { withRetry, isTransientError } from '../llm/retry';
import {
  InferenceStage,
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMMessage,
} from '../llm/types';
import { logger } from '../observability/logger';
import { InferenceError } from './errors';
import { PromptManager } from './prompt-manager';
import {
  CLASSIFICATION_RESPONSE_SCHEMA,
  RANKING_RESPONSE_SCHEMA,
  parseClassificationResponse,
  parseRankingResponse,
} from './response-contract';
import {
  ClassificationJudgement,
  InferenceContext,
  InferenceService,
  RankableCandidate,
  RankedProductJudgement,
} from './types';

export interface LLMInferenceOptions {
  maxRetries: number;
  retryBaseDelayMs: number;
  classifyMaxTokens: number;
  rankMaxTokens: number;
  /** Requested recommendations per message, substituted into the ranking prompt */
  maxRecommendations: number;
  temperature: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * InferenceService backed by the ModelRouter.
 *
 * Each call is one JSON-mode completion: the system prompt carries the
 * instructions plus the response schema, the user turn carries the message
 * (and, for ranking, the candidate list). Transient failures are retried
 * with backoff; malformed output is rejected without a retry.
 */
export class LLMInferenceService implements InferenceService {
  private readonly log = logger.child({ component: 'llm-inference' });

  constructor(
    private readonly router: ModelRouter,
    private readonly prompts: PromptManager,
    private readonly options: LLMInferenceOptions,
  ) {}

  async classify(
    messageText: string,
    categories: readonly ProductCategory[],
    context: InferenceContext,
  ): Promise<ClassificationJudgement> {
    const system = [
      this.prompts.render('classification', {
        categories: categories.map((c) => `- ${c}`).join('\n'),
      }),
      '',
      'Respond with a JSON object matching this schema:',
      JSON.stringify(CLASSIFICATION_RESPONSE_SCHEMA, null, 2),
    ].join('\n');

    const completion = await this.complete('classify', context, this.options.classifyMaxTokens, [
      { role: 'system', content: system },
      { role: 'user', content: `User message:\n"""\n${messageText}\n"""` },
    ]);

    return parseClassificationResponse(completion.content);
  }

  async rank(
    messageText: string,
    candidates: readonly RankableCandidate[],
    context: InferenceContext,
  ): Promise<RankedProductJudgement[]> {
    const system = [
      this.prompts.render('ranking', { maxRecommendations: this.options.maxRecommendations }),
      '',
      'Respond with a JSON object matching this schema:',
      JSON.stringify(RANKING_RESPONSE_SCHEMA, null, 2),
    ].join('\n');

    const user = [
      `User message:\n"""\n${messageText}\n"""`,
      '',
      'Candidate products:',
      formatCandidates(candidates),
    ].join('\n');

    const completion = await this.complete('rank', context, this.options.rankMaxTokens, [
      { role: 'system', content: system },
      { role: 'user', content: user },
    ]);

    return parseRankingResponse(completion.content);
  }

  private async complete(
    stage: InferenceStage,
    context: InferenceContext,
    maxTokens: number,
    messages: LLMMessage[],
  ): Promise<LLMCompletionResponse> {
    const log = this.log.child({ stage, messageId: context.messageId, requestId: context.requestId });

    if (this.router.isFullyOpen()) {
      throw new InferenceError('provider', stage, 'All LLM providers are circuit-broken');
    }

    const request: LLMCompletionRequest = {
      messages,
      temperature: this.options.temperature,
      maxTokens,
      jsonMode: true,
    };

    try {
      const completion = await withRetry(
        () => this.router.complete(request, { messageId: context.messageId, stage, requestId: context.requestId }),
        {
          retries: this.options.maxRetries,
          baseDelayMs: this.options.retryBaseDelayMs,
          sleep: this.options.sleep,
          onRetry: (err, attempt, delayMs) =>
            log.warn({ err, attempt, delayMs }, 'Transient inference failure, retrying'),
        },
      );

      log.info({
        provider: completion.provider,
        model: completion.model,
        latencyMs: completion.latencyMs,
        tokens: completion.usage.totalTokens,
      }, 'Inference call completed');

      return completion;
    } catch (err) {
      const transient = isTransientError(err);
      const message = err instanceof Error ? err.message : String(err);
      throw new InferenceError(transient ? 'transient' : 'provider', stage, message, err);
    }
  }
}

export function formatCandidates(candidates: readonly RankableCandidate[]): string {
  return candidates
    .map((c) => {
      const availability = c.availability === 'preorder' ? 'preorder' : 'in stock';
      return `- ${c.productId}: ${c.name} | ${c.category} | $${c.price.toFixed(2)} | ${c.rating}★ | ${availability} | ${c.description}`;
    })
    .join('\n');
}
