import * as fs from 'fs';
import { parse } from 'csv-parse/sync';

export interface CsvRow {
  /** 1-based line in the file where the record starts */
  line: number;
  values: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringValues(record: Record<string, unknown>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') values[key] = value;
  }
  return values;
}

/**
 * Read a headed CSV file into string-valued rows.
 * Column-count mismatches are tolerated here; callers validate fields per row.
 */
export function readCsvRows(filePath: string): CsvRow[] {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = parse(content, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    info: true,
  });

  if (!Array.isArray(parsed)) return [];

  const rows: CsvRow[] = [];
  parsed.forEach((entry: unknown, index) => {
    if (!isRecord(entry) || !isRecord(entry.record)) return;
    const info = isRecord(entry.info) ? entry.info : {};
    const line = typeof info.lines === 'number' ? info.lines : index + 2;
    rows.push({ line, values: toStringValues(entry.record) });
  });
  return rows;
}

export function parseBooleanCell(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const v = value.toLowerCase();
  if (v === 'true' || v === '1' || v === 'yes' || v === 'y') return true;
  if (v === 'false' || v === '0' || v === 'no' || v === 'n') return false;
  return undefined;
}

export function parseNumberCell(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}
