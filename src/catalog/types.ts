import { ProductCategory } from './categories';

export interface Message {
  id: string;
  body: string;
  /** ISO-8601 timestamp as recorded in the message log */
  timestamp: string;
  userId: string;
}

export interface Product {
  id: string;
  name: string;
  description: string;
  category: ProductCategory;
  price: number;
  /** 0–5 */
  rating: number;
  stockCount: number;
  preorderEligible: boolean;
}

/** Ground truth recorded for one message after the fact */
export interface HistoricalOutcome {
  messageId: string;
  clickedProductIds: readonly string[];
  purchasedProductId: string | null;
}

export interface RowWarning {
  file: string;
  /** 1-based line number in the source file (header is line 1) */
  line: number;
  reason: string;
}

/** Read-only access to the catalog snapshot and the message log */
export interface CatalogDataSource {
  loadProducts(): Promise<Product[]>;
  loadMessages(): Promise<Message[]>;
  loadHistoricalOutcomes(): Promise<Map<string, HistoricalOutcome>>;
}
