import { ProductCategory } from '../catalog/categories';
import { Product } from '../catalog/types';
import { Sentiment } from '../inference/types';

// ───── Classification ─────────────────────────────────────

export interface ClassificationResult {
  hasPurchaseIntent: boolean;
  /** At most 3, most relevant first; empty without purchase intent */
  categories: ProductCategory[];
  sentiment: Sentiment;
  reasoning: string;
}

export type ClassificationOutcome =
  | { status: 'classified'; result: ClassificationResult }
  | { status: 'unavailable'; reason: string };

// ───── Candidates ─────────────────────────────────────────

export type Availability = 'in_stock' | 'preorder';

export interface Candidate {
  product: Product;
  /** Index of the matched category in ClassificationResult.categories (0 = most relevant) */
  categoryRank: number;
  availability: Availability;
}

export interface CandidateFilterResult {
  candidates: Candidate[];
  /** Products removed by each rule, in rule order */
  excluded: {
    category: number;
    stock: number;
    rating: number;
  };
}

// ───── Selection ──────────────────────────────────────────

export interface RankedSelection {
  candidate: Candidate;
  confidence: number;
  reasoning: string;
}

export type SelectionOutcome =
  | { status: 'selected'; selections: RankedSelection[]; rankedCandidateCount: number }
  | { status: 'empty'; reason: string }
  | { status: 'unavailable'; reason: string };

// ───── Pipeline output ────────────────────────────────────

export interface Recommendation {
  messageId: string;
  productId: string;
  /** 0–1 */
  confidence: number;
  reasoning: string;
  /** 1-based position in the ranked list */
  rank: number;
}

export type FailureStage = 'classification' | 'selection' | 'pipeline';

export type RecommendationOutcome =
  | { kind: 'recommended'; messageId: string; categories: ProductCategory[]; recommendations: Recommendation[] }
  | { kind: 'no_intent'; messageId: string; reasoning: string }
  | { kind: 'no_eligible_candidates'; messageId: string; categories: ProductCategory[]; reasoning: string }
  | { kind: 'unavailable'; messageId: string; stage: FailureStage; reason: string };

export type OutcomeKind = RecommendationOutcome['kind'];

export const OUTCOME_KINDS: readonly OutcomeKind[] = [
  'recommended',
  'no_intent',
  'no_eligible_candidates',
  'unavailable',
];

/**
 * One row of the tabular output. Zero-recommendation messages produce a single
 * row with a null product id; historical files may carry no outcome column.
 */
export interface RecommendationRecord {
  messageId: string;
  productId: string | null;
  confidence: number | null;
  reasoning: string;
  rank: number | null;
  outcome: OutcomeKind | null;
}

export interface BatchSummary {
  total: number;
  recommended: number;
  noIntent: number;
  noEligibleCandidates: number;
  unavailable: number;
  recommendationCount: number;
}

export interface BatchResult {
  runId: string;
  outcomes: RecommendationOutcome[];
  summary: BatchSummary;
}
