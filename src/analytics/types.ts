/**
 * Offline evaluation types for recommendation sets.
 */

import { HistoricalOutcome, Product } from '../catalog/types';
import { RecommendationRecord } from '../recommendations/types';

export interface MetricsInput {
  records: readonly RecommendationRecord[];
  outcomes: ReadonlyMap<string, HistoricalOutcome>;
  products: readonly Product[];
  /** Messages under evaluation; defaults to every message id present in `records` */
  messageIds?: readonly string[];
}

export interface MetricsCounts {
  totalMessages: number;
  messagesWithRecommendation: number;
  /** Non-null recommendation rows considered (at most 3 per message) */
  recommendationRows: number;
  clickedMessages: number;
  /** Messages whose purchased product was among their recommendations */
  purchaseMatches: number;
  messagesWithPurchase: number;
  categoryMatches: number;
  outOfStockMessages: number;
  unknownProductRows: number;
  distinctProducts: number;
  failedMessages: number;
  /** Rows for messages outside the evaluated set */
  ignoredRows: number;
}

export interface MetricsRates {
  /** messagesWithRecommendation / totalMessages */
  recommendationRate: number;
  /** clickedMessages / totalMessages */
  clickThroughRate: number;
  /** purchaseMatches / totalMessages */
  purchaseRate: number;
  /** purchaseMatches / messagesWithPurchase */
  exactMatchRate: number;
  /** categoryMatches / messagesWithPurchase */
  categoryMatchRate: number;
  /** outOfStockMessages / messagesWithRecommendation */
  outOfStockRate: number;
}

export interface MetricsReport {
  label: string;
  counts: MetricsCounts;
  rates: MetricsRates;
  /** Mean over recommendation rows that carry a confidence; null when none do */
  meanConfidence: number | null;
  meanRecommendedRating: number | null;
}

export type MetricName = keyof MetricsRates | 'meanConfidence' | 'meanRecommendedRating';

export interface MetricDelta {
  metric: MetricName;
  baseline: number | null;
  candidate: number | null;
  /** Positive means the candidate set is better; null when either side is missing */
  delta: number | null;
  higherIsBetter: boolean;
}

export interface MetricsComparison {
  baseline: MetricsReport;
  candidate: MetricsReport;
  deltas: MetricDelta[];
  signConvention: string;
}
