import { Message, Product } from '../../src/catalog/types';
import { BusinessRules } from '../../src/config/rules-config';
import { ClassificationJudgement, InferenceService } from '../../src/inference/types';
import { Candidate } from '../../src/recommendations/types';

export const TEST_RULES: BusinessRules = {
  minRating: 3.5,
  minStock: 1,
  maxCandidates: 40,
  maxRecommendations: 3,
};

export function makeProduct(overrides: Partial<Product> & Pick<Product, 'id'>): Product {
  return {
    name: `Product ${overrides.id}`,
    description: 'Test product',
    category: 'Running Shoes',
    price: 100,
    rating: 4.5,
    stockCount: 10,
    preorderEligible: false,
    ...overrides,
  };
}

export function makeCandidate(
  overrides: Partial<Product> & Pick<Product, 'id'>,
  categoryRank = 0,
): Candidate {
  const product = makeProduct(overrides);
  return {
    product,
    categoryRank,
    availability: product.stockCount > 0 ? 'in_stock' : 'preorder',
  };
}

export function makeMessage(id: string, body: string): Message {
  return { id, body, timestamp: '2026-03-01T09:00:00Z', userId: `user-${id}` };
}

export function intentJudgement(
  categories: string[],
  overrides: Partial<ClassificationJudgement> = {},
): ClassificationJudgement {
  return {
    hasPurchaseIntent: true,
    categories,
    sentiment: 'positive',
    refersToPriorPurchase: false,
    reasoning: `Looking for ${categories.join(', ')}`,
    ...overrides,
  };
}

export function noIntentJudgement(reasoning = 'Order status question'): ClassificationJudgement {
  return {
    hasPurchaseIntent: false,
    categories: [],
    sentiment: 'neutral',
    refersToPriorPurchase: false,
    reasoning,
  };
}

export function stubInference(): jest.Mocked<InferenceService> {
  return {
    classify: jest.fn(),
    rank: jest.fn(),
  };
}

/** Ranks whatever it is given, best first, with confidence stepping down from 0.9 */
export function rankAllCandidates(inference: jest.Mocked<InferenceService>): void {
  inference.rank.mockImplementation(async (_text, candidates) =>
    candidates.map((c, i) => ({
      productId: c.productId,
      confidence: 0.9 - i * 0.1,
      reasoning: `${c.name} fits the request`,
    })),
  );
}
