import path from 'path';
import { buildRecommender, loadCatalog, RecommenderOptions } from '../app';
import { CsvCatalogDataSource } from '../catalog/csv-data-source';
import { Product } from '../catalog/types';
import { logger } from '../observability/logger';
import { toRecommendationRecords, writeRecommendationsCsv } from '../recommendations/recommendation-csv';
import { BatchSummary, RecommendationOutcome, RecommendationRecord } from '../recommendations/types';
import { stdoutWriter, Writer } from './output';

export interface RecommendArgs {
  output: string;
  dataDir: string;
  /** Single-message mode: recommend for this text only, nothing is written */
  message?: string;
}

/**
 * Render an outcome for the terminal. Recommended products found in
 * `products` get their name, description, price and rating underneath.
 */
export function describeOutcome(outcome: RecommendationOutcome, products: readonly Product[] = []): string[] {
  switch (outcome.kind) {
    case 'recommended': {
      const byId = new Map<string, Product>(products.map((p) => [p.id, p]));
      return [
        `Recommended for ${outcome.categories.join(', ')}:`,
        ...outcome.recommendations.flatMap((r) => {
          const line = `  ${r.rank}. ${r.productId}  confidence ${r.confidence.toFixed(2)}  ${r.reasoning}`;
          const product = byId.get(r.productId);
          if (!product) return [line];
          return [
            line,
            `     ${product.name}: ${product.description}`,
            `     $${product.price.toFixed(2)}  rated ${product.rating.toFixed(1)}`,
          ];
        }),
      ];
    }
    case 'no_intent':
      return [`No recommendation: no purchase intent. ${outcome.reasoning}`];
    case 'no_eligible_candidates':
      return [`No recommendation: no eligible product in ${outcome.categories.join(', ')}. ${outcome.reasoning}`];
    case 'unavailable':
      return [`Recommendation failed during ${outcome.stage}: ${outcome.reason}`];
  }
}

export function formatBatchSummary(summary: BatchSummary, outputPath: string): string[] {
  return [
    `Processed ${summary.total} message(s)`,
    `  recommended:            ${summary.recommended} (${summary.recommendationCount} product(s))`,
    `  no purchase intent:     ${summary.noIntent}`,
    `  no eligible candidates: ${summary.noEligibleCandidates}`,
    `  failed:                 ${summary.unavailable}`,
    `Recommendations written to ${outputPath}`,
  ];
}

/**
 * `recommend`: batch over messages.csv, or a single ad-hoc `--message`.
 * Resolves to the process exit code.
 */
export async function runRecommend(
  args: RecommendArgs,
  options: RecommenderOptions = {},
  write: Writer = stdoutWriter,
): Promise<number> {
  const log = logger.child({ component: 'cli', command: 'recommend' });

  if (args.message !== undefined) {
    const products = await new CsvCatalogDataSource(args.dataDir).loadProducts();
    const { pipeline } = buildRecommender(products, options);
    const outcome = await pipeline.recommendText(args.message);
    describeOutcome(outcome, products).forEach((line) => write(line));
    return outcome.kind === 'unavailable' ? 1 : 0;
  }

  const catalog = await loadCatalog(args.dataDir);
  const { pipeline } = buildRecommender(catalog.products, options);

  const records: RecommendationRecord[] = [];
  const result = await pipeline.processBatch(catalog.messages, (outcome, index) => {
    records.push(...toRecommendationRecords(outcome));
    log.debug({ index, messageId: outcome.messageId, outcome: outcome.kind }, 'Progress');
  });

  const outputPath = path.resolve(args.output);
  writeRecommendationsCsv(outputPath, records);
  formatBatchSummary(result.summary, outputPath).forEach((line) => write(line));
  return 0;
}
