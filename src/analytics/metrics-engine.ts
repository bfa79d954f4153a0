/**
 * Metrics engine: scores a recommendation set against recorded behaviour.
 *
 * The unit of every rate is the message. A message "received a recommendation"
 * when it has at least one row with a product id; rows with a null product id
 * count toward denominators only. Engagement rates divide by all evaluated
 * messages, accuracy rates by messages with a recorded purchase, and the
 * out-of-stock rate by messages that received a recommendation.
 */

import { Product } from '../catalog/types';
import { RecommendationRecord } from '../recommendations/types';
import {
  MetricDelta,
  MetricName,
  MetricsComparison,
  MetricsCounts,
  MetricsInput,
  MetricsRates,
  MetricsReport,
} from './types';

const MAX_RECOMMENDATIONS_PER_MESSAGE = 3;

export const SIGN_CONVENTION = 'positive delta = candidate better than baseline';

const HIGHER_IS_BETTER: Record<MetricName, boolean> = {
  recommendationRate: true,
  clickThroughRate: true,
  purchaseRate: true,
  exactMatchRate: true,
  categoryMatchRate: true,
  outOfStockRate: false,
  meanConfidence: true,
  meanRecommendedRating: true,
};

const METRIC_ORDER: MetricName[] = [
  'recommendationRate',
  'clickThroughRate',
  'purchaseRate',
  'exactMatchRate',
  'categoryMatchRate',
  'outOfStockRate',
  'meanConfidence',
  'meanRecommendedRating',
];

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

function mean(values: number[]): number | null {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : null;
}

/** Recommended rows per message in rank order (unranked rows keep file order), distinct, capped at 3 */
function recommendedRows(rows: readonly RecommendationRecord[]): RecommendationRecord[] {
  const ranked = rows
    .filter((r) => r.productId !== null)
    .map((r, index) => ({ r, index }))
    .sort((a, b) => (a.r.rank ?? Infinity) - (b.r.rank ?? Infinity) || a.index - b.index)
    .map(({ r }) => r);

  const seen = new Set<string>();
  const result: RecommendationRecord[] = [];
  for (const row of ranked) {
    if (row.productId === null || seen.has(row.productId)) continue;
    seen.add(row.productId);
    result.push(row);
    if (result.length === MAX_RECOMMENDATIONS_PER_MESSAGE) break;
  }
  return result;
}

export function computeMetrics(input: MetricsInput, label = 'Recommendations'): MetricsReport {
  const productsById = new Map<string, Product>(input.products.map((p) => [p.id, p]));

  const rowsByMessage = new Map<string, RecommendationRecord[]>();
  for (const record of input.records) {
    const rows = rowsByMessage.get(record.messageId);
    if (rows) rows.push(record);
    else rowsByMessage.set(record.messageId, [record]);
  }

  const messageIds = [...new Set(input.messageIds ?? rowsByMessage.keys())];
  const evaluated = new Set(messageIds);

  const counts: MetricsCounts = {
    totalMessages: messageIds.length,
    messagesWithRecommendation: 0,
    recommendationRows: 0,
    clickedMessages: 0,
    purchaseMatches: 0,
    messagesWithPurchase: 0,
    categoryMatches: 0,
    outOfStockMessages: 0,
    unknownProductRows: 0,
    distinctProducts: 0,
    failedMessages: 0,
    ignoredRows: 0,
  };

  for (const [messageId, rows] of rowsByMessage) {
    if (!evaluated.has(messageId)) counts.ignoredRows += rows.length;
  }

  const confidences: number[] = [];
  const ratings: number[] = [];
  const distinct = new Set<string>();

  for (const messageId of messageIds) {
    const rows = rowsByMessage.get(messageId) ?? [];
    const recommended = recommendedRows(rows);
    const recommendedIds = new Set<string>();
    const recommendedCategories = new Set<string>();
    let outOfStock = false;

    if (rows.some((r) => r.outcome === 'unavailable')) counts.failedMessages++;

    for (const row of recommended) {
      if (row.productId === null) continue;
      recommendedIds.add(row.productId);
      distinct.add(row.productId);
      counts.recommendationRows++;
      if (row.confidence !== null) confidences.push(row.confidence);

      const product = productsById.get(row.productId);
      if (!product) {
        counts.unknownProductRows++;
        continue;
      }
      recommendedCategories.add(product.category);
      ratings.push(product.rating);
      if (product.stockCount === 0 && !product.preorderEligible) outOfStock = true;
    }

    if (recommendedIds.size > 0) counts.messagesWithRecommendation++;
    if (outOfStock) counts.outOfStockMessages++;

    const outcome = input.outcomes.get(messageId);
    if (!outcome) continue;

    if (outcome.clickedProductIds.some((id) => recommendedIds.has(id))) counts.clickedMessages++;

    if (outcome.purchasedProductId !== null) {
      counts.messagesWithPurchase++;
      if (recommendedIds.has(outcome.purchasedProductId)) counts.purchaseMatches++;
      const purchased = productsById.get(outcome.purchasedProductId);
      if (purchased && recommendedCategories.has(purchased.category)) counts.categoryMatches++;
    }
  }

  counts.distinctProducts = distinct.size;

  const rates: MetricsRates = {
    recommendationRate: ratio(counts.messagesWithRecommendation, counts.totalMessages),
    clickThroughRate: ratio(counts.clickedMessages, counts.totalMessages),
    purchaseRate: ratio(counts.purchaseMatches, counts.totalMessages),
    exactMatchRate: ratio(counts.purchaseMatches, counts.messagesWithPurchase),
    categoryMatchRate: ratio(counts.categoryMatches, counts.messagesWithPurchase),
    outOfStockRate: ratio(counts.outOfStockMessages, counts.messagesWithRecommendation),
  };

  return {
    label,
    counts,
    rates,
    meanConfidence: mean(confidences),
    meanRecommendedRating: mean(ratings),
  };
}

export function metricValue(report: MetricsReport, metric: MetricName): number | null {
  switch (metric) {
    case 'meanConfidence':
      return report.meanConfidence;
    case 'meanRecommendedRating':
      return report.meanRecommendedRating;
    default:
      return report.rates[metric];
  }
}

/**
 * Compare two reports metric by metric. Every delta follows SIGN_CONVENTION:
 * for "lower is better" metrics (out-of-stock rate) it is baseline − candidate.
 */
export function compareMetrics(baseline: MetricsReport, candidate: MetricsReport): MetricsComparison {
  const deltas: MetricDelta[] = METRIC_ORDER.map((metric) => {
    const b = metricValue(baseline, metric);
    const c = metricValue(candidate, metric);
    const higherIsBetter = HIGHER_IS_BETTER[metric];
    const delta = b === null || c === null ? null : higherIsBetter ? c - b : b - c;
    return { metric, baseline: b, candidate: c, delta, higherIsBetter };
  });

  return { baseline, candidate, deltas, signConvention: SIGN_CONVENTION };
}
