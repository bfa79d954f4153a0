import * as fs from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { readCsvRows, parseNumberCell } from '../catalog/csv';
import { RowWarning } from '../catalog/types';
import { OUTCOME_KINDS, RecommendationOutcome, RecommendationRecord } from './types';

export const RECOMMENDATION_COLUMNS = [
  'message_id',
  'recommended_product_id',
  'confidence',
  'reasoning',
  'rank',
  'outcome',
] as const;

/**
 * Flatten one outcome into output rows: one row per recommendation, or a
 * single row with a null product id explaining why nothing was recommended.
 */
export function toRecommendationRecords(outcome: RecommendationOutcome): RecommendationRecord[] {
  switch (outcome.kind) {
    case 'recommended':
      return outcome.recommendations.map((r) => ({
        messageId: r.messageId,
        productId: r.productId,
        confidence: r.confidence,
        reasoning: r.reasoning,
        rank: r.rank,
        outcome: outcome.kind,
      }));
    case 'no_intent':
      return [nullRecord(outcome.messageId, `No purchase intent: ${outcome.reasoning}`, outcome.kind)];
    case 'no_eligible_candidates':
      return [nullRecord(outcome.messageId, `No eligible product: ${outcome.reasoning}`, outcome.kind)];
    case 'unavailable':
      return [nullRecord(outcome.messageId, `Processing failed (${outcome.stage}): ${outcome.reason}`, outcome.kind)];
  }
}

function nullRecord(messageId: string, reasoning: string, outcome: RecommendationRecord['outcome']): RecommendationRecord {
  return { messageId, productId: null, confidence: null, reasoning, rank: null, outcome };
}

export function formatRecommendationsCsv(records: readonly RecommendationRecord[]): string {
  return stringify(
    records.map((r) => ({
      message_id: r.messageId,
      recommended_product_id: r.productId ?? '',
      confidence: r.confidence ?? '',
      reasoning: r.reasoning,
      rank: r.rank ?? '',
      outcome: r.outcome ?? '',
    })),
    { header: true, columns: [...RECOMMENDATION_COLUMNS] },
  );
}

export function writeRecommendationsCsv(filePath: string, records: readonly RecommendationRecord[]): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, formatRecommendationsCsv(records), 'utf-8');
}

/**
 * Read a recommendation file: either this tool's output or a historical
 * export with at least `message_id` and `recommended_product_id`.
 */
export function readRecommendationsCsv(filePath: string): { records: RecommendationRecord[]; warnings: RowWarning[] } {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Recommendations file not found: ${filePath}`);
  }

  const file = path.basename(filePath);
  const records: RecommendationRecord[] = [];
  const warnings: RowWarning[] = [];

  for (const { line, values } of readCsvRows(filePath)) {
    const messageId = values.message_id;
    if (!messageId) {
      warnings.push({ file, line, reason: 'missing message_id' });
      continue;
    }

    const confidence = parseNumberCell(values.confidence);
    if (values.confidence && (confidence === undefined || confidence < 0 || confidence > 1)) {
      warnings.push({ file, line, reason: `invalid confidence "${values.confidence}"` });
      continue;
    }

    const rank = parseNumberCell(values.rank);
    records.push({
      messageId,
      productId: values.recommended_product_id || null,
      confidence: confidence ?? null,
      reasoning: values.reasoning ?? '',
      rank: rank !== undefined && Number.isInteger(rank) ? rank : null,
      outcome: OUTCOME_KINDS.find((k) => k === values.outcome) ?? null,
    });
  }

  return { records, warnings };
}
