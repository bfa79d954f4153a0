import { MetricName, MetricsComparison, MetricsReport } from './types';

const RULE = '='.repeat(60);

const METRIC_LABELS: Record<MetricName, string> = {
  recommendationRate: 'Recommendation Rate',
  clickThroughRate: 'Click-Through Rate',
  purchaseRate: 'Purchase Rate',
  exactMatchRate: 'Exact Match Rate',
  categoryMatchRate: 'Category Match Rate',
  outOfStockRate: 'Out-of-Stock Rate',
  meanConfidence: 'Avg Confidence',
  meanRecommendedRating: 'Avg Product Rating',
};

const MEAN_METRICS: ReadonlySet<MetricName> = new Set<MetricName>(['meanConfidence', 'meanRecommendedRating']);

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function formatMean(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(2);
}

function line(label: string, value: string, detail?: string): string {
  const row = `  ${`${label}:`.padEnd(24)}${value.padStart(7)}`;
  return detail ? `${row}  (${detail})` : row;
}

function header(title: string): string[] {
  return [RULE, ` ${title}`, RULE];
}

export function formatReport(report: MetricsReport): string {
  const { counts, rates } = report;
  return [
    ...header(report.label),
    '',
    'Coverage:',
    line('Messages Evaluated', String(counts.totalMessages)),
    line('Recommendation Rate', formatPercent(rates.recommendationRate), `${counts.messagesWithRecommendation}/${counts.totalMessages}`),
    line('Failed Messages', String(counts.failedMessages)),
    '',
    'Engagement:',
    line('Click-Through Rate', formatPercent(rates.clickThroughRate), `${counts.clickedMessages}/${counts.totalMessages}`),
    line('Purchase Rate', formatPercent(rates.purchaseRate), `${counts.purchaseMatches}/${counts.totalMessages}`),
    '',
    'Accuracy:',
    line('Exact Match Rate', formatPercent(rates.exactMatchRate), `${counts.purchaseMatches}/${counts.messagesWithPurchase}`),
    line('Category Match Rate', formatPercent(rates.categoryMatchRate), `${counts.categoryMatches}/${counts.messagesWithPurchase}`),
    '',
    'Quality:',
    line('Out-of-Stock Rate', formatPercent(rates.outOfStockRate), `${counts.outOfStockMessages}/${counts.messagesWithRecommendation}`),
    line('Avg Product Rating', formatMean(report.meanRecommendedRating)),
    line('Avg Confidence', formatMean(report.meanConfidence)),
    line('Distinct Products', String(counts.distinctProducts)),
    line('Unknown Product Rows', String(counts.unknownProductRows)),
  ].join('\n');
}

function formatValue(metric: MetricName, value: number | null): string {
  if (value === null) return 'n/a';
  return MEAN_METRICS.has(metric) ? value.toFixed(2) : formatPercent(value);
}

function formatDelta(metric: MetricName, delta: number | null): string {
  if (delta === null) return 'n/a';
  const sign = delta > 0 ? '+' : delta < 0 ? '-' : '';
  const magnitude = Math.abs(delta);
  return MEAN_METRICS.has(metric)
    ? `${sign}${magnitude.toFixed(2)}`
    : `${sign}${(magnitude * 100).toFixed(1)}pp`;
}

export function formatComparison(comparison: MetricsComparison): string {
  const rows = comparison.deltas.map((d) =>
    `  ${METRIC_LABELS[d.metric].padEnd(22)}` +
    `${formatValue(d.metric, d.baseline).padStart(10)}` +
    `${formatValue(d.metric, d.candidate).padStart(11)}` +
    `${formatDelta(d.metric, d.delta).padStart(11)}`,
  );

  return [
    formatReport(comparison.baseline),
    '',
    formatReport(comparison.candidate),
    '',
    ...header(`Comparison: ${comparison.candidate.label} vs ${comparison.baseline.label}`),
    ` (${comparison.signConvention})`,
    '',
    `  ${'Metric'.padEnd(22)}${'Baseline'.padStart(10)}${'Candidate'.padStart(11)}${'Delta'.padStart(11)}`,
    ...rows,
  ].join('\n');
}
