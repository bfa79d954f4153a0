import * as fs from 'fs';
import * as path from 'path';
import { resolveCategory } from './categories';
import { readCsvRows, parseBooleanCell, parseNumberCell, CsvRow } from './csv';
import { CatalogDataSource, HistoricalOutcome, Message, Product, RowWarning } from './types';
import { logger } from '../observability/logger';

export const PRODUCTS_FILE = 'products.csv';
export const MESSAGES_FILE = 'messages.csv';
export const HISTORY_FILE = 'recommendations_history.csv';

type RowResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/** One messages.csv row: the message and the clicks/purchase recorded for it */
interface MessageLogEntry {
  message: Message;
  outcome: HistoricalOutcome;
}

/**
 * Catalog and message log backed by the CSV exports in a data directory.
 *
 * Malformed rows are skipped and recorded in `warnings`; they never abort a load.
 * A missing file is a hard error.
 */
export class CsvCatalogDataSource implements CatalogDataSource {
  readonly warnings: RowWarning[] = [];
  private messageLog?: MessageLogEntry[];
  private readonly log = logger.child({ component: 'csv-data-source' });

  constructor(private readonly dataDir: string) {}

  get historyPath(): string {
    return path.join(this.dataDir, HISTORY_FILE);
  }

  async loadProducts(): Promise<Product[]> {
    return this.loadFile(PRODUCTS_FILE, parseProductRow, (p) => p.id);
  }

  async loadMessages(): Promise<Message[]> {
    return this.readMessageLog().map((entry) => entry.message);
  }

  async loadHistoricalOutcomes(): Promise<Map<string, HistoricalOutcome>> {
    return new Map<string, HistoricalOutcome>(this.readMessageLog().map((entry) => [entry.message.id, entry.outcome]));
  }

  /** messages.csv is parsed once; messages and outcomes share the same kept rows */
  private readMessageLog(): MessageLogEntry[] {
    this.messageLog ??= this.loadFile(MESSAGES_FILE, parseMessageLogRow, (entry) => entry.message.id);
    return this.messageLog;
  }

  private loadFile<T>(
    fileName: string,
    parseRow: (row: CsvRow) => RowResult<T>,
    keyOf?: (item: T) => string,
  ): T[] {
    const filePath = path.join(this.dataDir, fileName);
    if (!fs.existsSync(filePath)) {
      throw new Error(`Data file not found: ${filePath}`);
    }

    const items: T[] = [];
    const seen = new Set<string>();
    let skipped = 0;
    for (const row of readCsvRows(filePath)) {
      const result = parseRow(row);
      if (!result.ok) {
        skipped++;
        this.warn(fileName, row.line, result.reason);
        continue;
      }
      const key = keyOf?.(result.value);
      if (key !== undefined) {
        if (seen.has(key)) {
          skipped++;
          this.warn(fileName, row.line, `duplicate id ${key}; keeping first`);
          continue;
        }
        seen.add(key);
      }
      items.push(result.value);
    }

    this.log.info({ file: fileName, loaded: items.length, skipped }, 'Data file loaded');
    return items;
  }

  private warn(file: string, line: number, reason: string): void {
    this.warnings.push({ file, line, reason });
    this.log.warn({ file, line, reason }, 'Skipping malformed row');
  }
}

export function parseProductRow({ values }: CsvRow): RowResult<Product> {
  const id = values.product_id;
  if (!id) return { ok: false, reason: 'missing product_id' };

  const category = resolveCategory(values.category ?? '');
  if (!category) return { ok: false, reason: `unknown category "${values.category ?? ''}"` };

  const price = parseNumberCell(values.price);
  if (price === undefined || price < 0) return { ok: false, reason: `invalid price "${values.price ?? ''}"` };

  const rating = parseNumberCell(values.avg_rating);
  if (rating === undefined || rating < 0 || rating > 5) {
    return { ok: false, reason: `invalid avg_rating "${values.avg_rating ?? ''}"` };
  }

  const stock = parseNumberCell(values.stock_quantity);
  if (stock === undefined || stock < 0 || !Number.isInteger(stock)) {
    return { ok: false, reason: `invalid stock_quantity "${values.stock_quantity ?? ''}"` };
  }

  const preorderCell = values.preorder_eligible;
  const preorderEligible = parseBooleanCell(preorderCell);
  if (preorderCell && preorderEligible === undefined) {
    return { ok: false, reason: `invalid preorder_eligible "${preorderCell}"` };
  }

  return {
    ok: true,
    value: {
      id,
      name: values.name ?? id,
      description: values.description ?? '',
      category,
      price,
      rating,
      stockCount: stock,
      preorderEligible: preorderEligible ?? false,
    },
  };
}

export function parseMessageRow({ values }: CsvRow): RowResult<Message> {
  const id = values.message_id;
  if (!id) return { ok: false, reason: 'missing message_id' };
  const body = values.message;
  if (!body) return { ok: false, reason: `empty message body for ${id}` };

  return {
    ok: true,
    value: {
      id,
      body,
      timestamp: values.timestamp ?? '',
      userId: values.user_id ?? '',
    },
  };
}

export function parseMessageLogRow(row: CsvRow): RowResult<MessageLogEntry> {
  const message = parseMessageRow(row);
  if (!message.ok) return message;
  const outcome = parseOutcomeRow(row);
  if (!outcome.ok) return outcome;
  return { ok: true, value: { message: message.value, outcome: outcome.value } };
}

export function parseOutcomeRow({ values }: CsvRow): RowResult<HistoricalOutcome> {
  const messageId = values.message_id;
  if (!messageId) return { ok: false, reason: 'missing message_id' };

  const clicked = (values.clicked_product_ids ?? '')
    .split(';')
    .map((id) => id.trim())
    .filter(Boolean);

  return {
    ok: true,
    value: {
      messageId,
      clickedProductIds: clicked,
      purchasedProductId: values.converted_to_purchase || null,
    },
  };
}
