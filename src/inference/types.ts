import { ProductCategory } from '../catalog/categories';

export type Sentiment = 'positive' | 'neutral' | 'negative';

/** Raw classification judgement as returned by the inference service */
export interface ClassificationJudgement {
  hasPurchaseIntent: boolean;
  /** Labels as the model produced them, most relevant first; not yet checked against the taxonomy */
  categories: string[];
  sentiment: Sentiment;
  /** The message talks about something the user already bought */
  refersToPriorPurchase: boolean;
  reasoning: string;
}

export interface RankedProductJudgement {
  productId: string;
  confidence: number;
  reasoning: string;
}

/** Product summary handed to the ranker */
export interface RankableCandidate {
  productId: string;
  name: string;
  description: string;
  category: ProductCategory;
  price: number;
  rating: number;
  availability: 'in_stock' | 'preorder';
}

export interface InferenceContext {
  messageId: string;
  requestId?: string;
}

/**
 * Capability the classifier and selector depend on. Implementations reject
 * with an `InferenceError` when no usable judgement could be produced.
 */
export interface InferenceService {
  classify(
    messageText: string,
    categories: readonly ProductCategory[],
    context: InferenceContext,
  ): Promise<ClassificationJudgement>;

  rank(
    messageText: string,
    candidates: readonly RankableCandidate[],
    context: InferenceContext,
  ): Promise<RankedProductJudgement[]>;
}
