import { BusinessRules } from '../config/rules-config';
import { Product } from '../catalog/types';
import { Candidate, CandidateFilterResult, ClassificationResult } from './types';

export type FilterRules = Pick<BusinessRules, 'minRating' | 'minStock'>;

/**
 * Narrow the catalog to products eligible for one classified message.
 *
 * Rules, each sufficient on its own to exclude a product:
 *   1. category is one of the classifier's categories (membership only)
 *   2. stock ≥ minStock, or the product can be preordered
 *   3. rating ≥ minRating
 *
 * An empty result is a normal outcome, not an error.
 */
export function filterCandidates(
  products: readonly Product[],
  classification: ClassificationResult,
  rules: FilterRules,
): CandidateFilterResult {
  const excluded = { category: 0, stock: 0, rating: 0 };
  const candidates: Candidate[] = [];

  if (!classification.hasPurchaseIntent) {
    return { candidates, excluded: { ...excluded, category: products.length } };
  }

  for (const product of products) {
    const categoryRank = classification.categories.indexOf(product.category);
    if (categoryRank === -1) {
      excluded.category++;
      continue;
    }

    const inStock = product.stockCount >= rules.minStock;
    if (!inStock && !product.preorderEligible) {
      excluded.stock++;
      continue;
    }

    if (product.rating < rules.minRating) {
      excluded.rating++;
      continue;
    }

    candidates.push({
      product,
      categoryRank,
      availability: inStock ? 'in_stock' : 'preorder',
    });
  }

  return { candidates, excluded };
}

/**
 * Order candidates for the ranker: most relevant category first, then
 * rating (desc), stock (desc) and id, so truncation keeps the strongest ones.
 */
export function prioritizeCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort(
    (a, b) =>
      a.categoryRank - b.categoryRank ||
      b.product.rating - a.product.rating ||
      b.product.stockCount - a.product.stockCount ||
      a.product.id.localeCompare(b.product.id),
  );
}
