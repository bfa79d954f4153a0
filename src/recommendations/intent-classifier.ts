import { PRODUCT_CATEGORIES, ProductCategory, resolveCategory } from '../catalog/categories';
import { Message } from '../catalog/types';
import { describeError } from '../inference/errors';
import { ClassificationJudgement, InferenceContext, InferenceService } from '../inference/types';
import { logger } from '../observability/logger';
import { ClassificationOutcome, ClassificationResult } from './types';

const MAX_CATEGORIES = 3;

/**
 * Decides purchase intent and the ranked categories for one message.
 *
 * The model's judgement is post-processed: labels are resolved against the
 * closed taxonomy, and negative feedback about a prior purchase never counts
 * as purchase intent. A failed or unusable judgement is reported as
 * `unavailable`, never as "no intent".
 */
export class IntentClassifier {
  private readonly log = logger.child({ component: 'intent-classifier' });

  constructor(
    private readonly inference: InferenceService,
    private readonly categories: readonly ProductCategory[] = PRODUCT_CATEGORIES,
  ) {}

  async classify(message: Message, context: InferenceContext): Promise<ClassificationOutcome> {
    const log = this.log.child({ messageId: message.id });

    if (!message.body.trim()) {
      return {
        status: 'classified',
        result: { hasPurchaseIntent: false, categories: [], sentiment: 'neutral', reasoning: 'Empty message' },
      };
    }

    let judgement: ClassificationJudgement;
    try {
      judgement = await this.inference.classify(message.body, this.categories, context);
    } catch (err) {
      const reason = describeError(err);
      log.warn({ err }, 'Classification unavailable');
      return { status: 'unavailable', reason };
    }

    const result = this.interpret(judgement);
    if (result.hasPurchaseIntent && result.categories.length === 0) {
      log.warn({ categories: judgement.categories }, 'Purchase intent without any recognised category');
      return {
        status: 'unavailable',
        reason: `No recognised categories in classifier output: ${JSON.stringify(judgement.categories)}`,
      };
    }

    log.debug({ intent: result.hasPurchaseIntent, categories: result.categories }, 'Message classified');
    return { status: 'classified', result };
  }

  private interpret(judgement: ClassificationJudgement): ClassificationResult {
    if (judgement.sentiment === 'negative' && judgement.refersToPriorPurchase) {
      return {
        hasPurchaseIntent: false,
        categories: [],
        sentiment: judgement.sentiment,
        reasoning: `Negative feedback about a prior purchase. ${judgement.reasoning}`.trim(),
      };
    }

    if (!judgement.hasPurchaseIntent) {
      return {
        hasPurchaseIntent: false,
        categories: [],
        sentiment: judgement.sentiment,
        reasoning: judgement.reasoning,
      };
    }

    return {
      hasPurchaseIntent: true,
      categories: this.resolveCategories(judgement.categories),
      sentiment: judgement.sentiment,
      reasoning: judgement.reasoning,
    };
  }

  private resolveCategories(labels: string[]): ProductCategory[] {
    const allowed = new Set(this.categories);
    const resolved: ProductCategory[] = [];

    for (const label of labels) {
      const category = resolveCategory(label);
      if (!category || !allowed.has(category)) {
        this.log.warn({ label }, 'Dropping category outside the taxonomy');
        continue;
      }
      if (!resolved.includes(category)) resolved.push(category);
      if (resolved.length === MAX_CATEGORIES) break;
    }

    return resolved;
  }
}
