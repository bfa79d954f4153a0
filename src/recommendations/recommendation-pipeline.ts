import { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { Message, Product } from '../catalog/types';
import { logger } from '../observability/logger';
import { createTraceContext, endSpan, startSpan, summarizeSpans, TraceContext } from '../observability/trace';
import { FilterRules, filterCandidates } from './candidate-filter';
import { IntentClassifier } from './intent-classifier';
import { ProductSelector } from './product-selector';
import {
  BatchResult,
  BatchSummary,
  RecommendationOutcome,
} from './types';

export interface PipelineOptions {
  rules: FilterRules;
  /** Pause between messages in batch mode (provider rate limits) */
  interMessageDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs classifier → candidate filter → selector for each message.
 *
 * Every message is independent: the catalog is a read-only snapshot and a
 * failure on one message becomes an `unavailable` outcome for that message only.
 */
export class RecommendationPipeline {
  private readonly log = logger.child({ component: 'recommendation-pipeline' });
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly products: readonly Product[],
    private readonly classifier: IntentClassifier,
    private readonly selector: ProductSelector,
    private readonly options: PipelineOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async processMessage(message: Message, trace?: TraceContext): Promise<RecommendationOutcome> {
    const ctx = trace ?? createTraceContext({ messageId: message.id });
    const log = this.log.child({ messageId: message.id, requestId: ctx.requestId });
    const inferenceContext = { messageId: message.id, requestId: ctx.requestId };

    // 1. Intent + categories
    const classifySpan = startSpan(ctx, 'classify');
    const classification = await this.classifier.classify(message, inferenceContext);
    endSpan(classifySpan, classification.status === 'classified' ? 'ok' : 'error');

    if (classification.status === 'unavailable') {
      return this.finish(log, ctx, { kind: 'unavailable', messageId: message.id, stage: 'classification', reason: classification.reason });
    }

    const { result } = classification;
    if (!result.hasPurchaseIntent) {
      return this.finish(log, ctx, { kind: 'no_intent', messageId: message.id, reasoning: result.reasoning });
    }

    // 2. Business rules
    const filterSpan = startSpan(ctx, 'filter');
    const { candidates, excluded } = filterCandidates(this.products, result, this.options.rules);
    endSpan(filterSpan, 'ok', { candidates: candidates.length });
    log.debug({ categories: result.categories, candidates: candidates.length, excluded }, 'Candidates filtered');

    // 3. Ranking
    const selectSpan = startSpan(ctx, 'select');
    const selection = await this.selector.select(message.body, candidates, inferenceContext);
    endSpan(selectSpan, selection.status === 'unavailable' ? 'error' : 'ok');

    switch (selection.status) {
      case 'unavailable':
        return this.finish(log, ctx, { kind: 'unavailable', messageId: message.id, stage: 'selection', reason: selection.reason });
      case 'empty':
        return this.finish(log, ctx, {
          kind: 'no_eligible_candidates',
          messageId: message.id,
          categories: result.categories,
          reasoning: selection.reason,
        });
      case 'selected':
        return this.finish(log, ctx, {
          kind: 'recommended',
          messageId: message.id,
          categories: result.categories,
          recommendations: selection.selections.map((s, i) => ({
            messageId: message.id,
            productId: s.candidate.product.id,
            confidence: s.confidence,
            reasoning: s.reasoning,
            rank: i + 1,
          })),
        });
    }
  }

  /**
   * Process messages in order. `onOutcome` sees each outcome as soon as it is
   * known (progress reporting, streaming output).
   */
  async processBatch(
    messages: readonly Message[],
    onOutcome?: (outcome: RecommendationOutcome, index: number) => void,
  ): Promise<BatchResult> {
    const runId = uuidv4();
    const log = this.log.child({ runId });
    const outcomes: RecommendationOutcome[] = [];
    const delayMs = this.options.interMessageDelayMs ?? 0;

    log.info({ messages: messages.length, products: this.products.length }, 'Batch started');

    for (let i = 0; i < messages.length; i++) {
      const message = messages[i];
      if (i > 0 && delayMs > 0) await this.sleep(delayMs);

      let outcome: RecommendationOutcome;
      try {
        outcome = await this.processMessage(message, createTraceContext({ messageId: message.id, runId }));
      } catch (err) {
        log.error({ err, messageId: message.id }, 'Unexpected failure while processing message');
        outcome = {
          kind: 'unavailable',
          messageId: message.id,
          stage: 'pipeline',
          reason: err instanceof Error ? err.message : String(err),
        };
      }

      outcomes.push(outcome);
      onOutcome?.(outcome, i);
    }

    const summary = summarizeOutcomes(outcomes);
    log.info(summary, 'Batch finished');
    return { runId, outcomes, summary };
  }

  /** Single-message mode for an ad-hoc query */
  async recommendText(text: string, userId = 'adhoc'): Promise<RecommendationOutcome> {
    const message: Message = {
      id: `adhoc-${uuidv4()}`,
      body: text,
      timestamp: new Date().toISOString(),
      userId,
    };
    return this.processMessage(message);
  }

  private finish(
    log: Logger,
    ctx: TraceContext,
    outcome: RecommendationOutcome,
  ): RecommendationOutcome {
    const timings = summarizeSpans(ctx);
    if (outcome.kind === 'unavailable') {
      log.warn({ stage: outcome.stage, reason: outcome.reason, timings }, 'Message processing failed');
    } else {
      log.info({
        outcome: outcome.kind,
        recommendations: outcome.kind === 'recommended' ? outcome.recommendations.length : 0,
        timings,
      }, 'Message processed');
    }
    return outcome;
  }
}

export function summarizeOutcomes(outcomes: readonly RecommendationOutcome[]): BatchSummary {
  const summary: BatchSummary = {
    total: outcomes.length,
    recommended: 0,
    noIntent: 0,
    noEligibleCandidates: 0,
    unavailable: 0,
    recommendationCount: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'recommended':
        summary.recommended++;
        summary.recommendationCount += outcome.recommendations.length;
        break;
      case 'no_intent':
        summary.noIntent++;
        break;
      case 'no_eligible_candidates':
        summary.noEligibleCandidates++;
        break;
      case 'unavailable':
        summary.unavailable++;
        break;
    }
  }

  return summary;
}
