import { BusinessRules } from '../config/rules-config';
import { describeError } from '../inference/errors';
import { InferenceContext, InferenceService, RankableCandidate, RankedProductJudgement } from '../inference/types';
import { logger } from '../observability/logger';
import { prioritizeCandidates } from './candidate-filter';
import { Candidate, RankedSelection, SelectionOutcome } from './types';

export type SelectorLimits = Pick<BusinessRules, 'maxCandidates' | 'maxRecommendations'>;

export function toRankableCandidate(candidate: Candidate): RankableCandidate {
  const { product } = candidate;
  return {
    productId: product.id,
    name: product.name,
    description: product.description,
    category: product.category,
    price: product.price,
    rating: product.rating,
    availability: candidate.availability,
  };
}

/**
 * Final ranking over the eligible candidates.
 *
 * - No candidates: returns `empty` without calling the inference service.
 * - Candidates are capped at `maxCandidates` (best category/rating first) before the call.
 * - Any id outside the supplied candidates, or a confidence outside [0, 1],
 *   rejects the whole ranking as `unavailable`.
 */
export class ProductSelector {
  private readonly log = logger.child({ component: 'product-selector' });

  constructor(
    private readonly inference: InferenceService,
    private readonly limits: SelectorLimits,
  ) {}

  async select(
    messageText: string,
    candidates: readonly Candidate[],
    context: InferenceContext,
  ): Promise<SelectionOutcome> {
    const log = this.log.child({ messageId: context.messageId });

    if (candidates.length === 0) {
      return { status: 'empty', reason: 'No eligible products in the requested categories' };
    }

    const ordered = prioritizeCandidates(candidates);
    const supplied = ordered.slice(0, this.limits.maxCandidates);
    if (supplied.length < ordered.length) {
      log.info(
        { eligible: ordered.length, supplied: supplied.length },
        'Candidate list truncated before ranking',
      );
    }

    let ranking: RankedProductJudgement[];
    try {
      ranking = await this.inference.rank(messageText, supplied.map(toRankableCandidate), context);
    } catch (err) {
      log.warn({ err }, 'Selection unavailable');
      return { status: 'unavailable', reason: describeError(err) };
    }

    const byId = new Map<string, Candidate>(supplied.map((c) => [c.product.id, c]));
    const selections: RankedSelection[] = [];
    const seen = new Set<string>();

    for (const item of ranking) {
      const candidate = byId.get(item.productId);
      if (!candidate) {
        log.warn({ productId: item.productId }, 'Ranker returned a product outside the candidate set');
        return { status: 'unavailable', reason: `Ranker returned unknown product id ${item.productId}` };
      }
      if (!Number.isFinite(item.confidence) || item.confidence < 0 || item.confidence > 1) {
        return {
          status: 'unavailable',
          reason: `Ranker returned confidence ${item.confidence} for ${item.productId}`,
        };
      }
      if (seen.has(item.productId)) continue;
      seen.add(item.productId);
      selections.push({ candidate, confidence: item.confidence, reasoning: item.reasoning });
    }

    const kept = selections.slice(0, this.limits.maxRecommendations);
    if (kept.length === 0) {
      return { status: 'empty', reason: `Ranker found no suitable product among ${supplied.length} candidates` };
    }

    return { status: 'selected', selections: kept, rankedCandidateCount: supplied.length };
  }
}
