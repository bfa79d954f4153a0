import path from 'path';
import { loadCatalog } from '../app';
import { compareMetrics, computeMetrics } from '../analytics/metrics-engine';
import { formatComparison, formatReport } from '../analytics/report-formatter';
import { logger } from '../observability/logger';
import { readRecommendationsCsv } from '../recommendations/recommendation-csv';
import { stdoutWriter, Writer } from './output';

export interface AnalyzeArgs {
  /** Recommendation CSV to score; the historical export when omitted */
  recommendations?: string;
  dataDir: string;
  /** Compare against the historical recommendation export in the data directory */
  compare: boolean;
  json: boolean;
}

/**
 * `analyze`: metrics for one recommendation file, or a side-by-side with the
 * historical baseline. A comparison evaluates both sets over the messages
 * they have in common. Without a file, the historical export itself is scored.
 */
export async function runAnalyze(args: AnalyzeArgs, write: Writer = stdoutWriter): Promise<number> {
  const log = logger.child({ component: 'cli', command: 'analyze' });
  if (args.compare && args.recommendations === undefined) {
    throw new Error('--compare needs a --recommendations file to compare with the historical baseline');
  }
  const catalog = await loadCatalog(args.dataDir);

  const candidatePath = args.recommendations === undefined
    ? catalog.dataSource.historyPath
    : path.resolve(args.recommendations);
  const candidateFile = readRecommendationsCsv(candidatePath);
  for (const warning of candidateFile.warnings) {
    log.warn(warning, 'Skipping malformed recommendation row');
  }

  if (!args.compare) {
    const report = computeMetrics(
      { records: candidateFile.records, outcomes: catalog.outcomes, products: catalog.products },
      args.recommendations === undefined ? 'Historical Baseline' : 'New Recommendations',
    );
    write(args.json ? JSON.stringify(report, null, 2) : formatReport(report));
    return 0;
  }

  const baselineFile = readRecommendationsCsv(catalog.dataSource.historyPath);
  for (const warning of baselineFile.warnings) {
    log.warn(warning, 'Skipping malformed recommendation row');
  }

  const baselineIds = new Set(baselineFile.records.map((r) => r.messageId));
  const messageIds = [...new Set(candidateFile.records.map((r) => r.messageId))].filter((id) => baselineIds.has(id));
  if (messageIds.length === 0) {
    throw new Error('The recommendation files have no message ids in common');
  }

  const comparison = compareMetrics(
    computeMetrics(
      { records: baselineFile.records, outcomes: catalog.outcomes, products: catalog.products, messageIds },
      'Historical Baseline',
    ),
    computeMetrics(
      { records: candidateFile.records, outcomes: catalog.outcomes, products: catalog.products, messageIds },
      'New Recommendations',
    ),
  );
  write(args.json ? JSON.stringify(comparison, null, 2) : formatComparison(comparison));
  return 0;
}
