/**
 * Closed product taxonomy. The classifier may only return these labels and
 * the candidate filter tests membership against the same set.
 */
export const PRODUCT_CATEGORIES = [
  'Running Shoes',
  'Yoga',
  'Laptops',
  'Electronics',
  'Headphones',
  'Outerwear',
  'Water Bottles',
  'Kitchen',
  'Fitness',
  'Camping',
  'Wearables',
  'Audio',
  'Workwear',
  'Tablets',
  'Home',
] as const;

export type ProductCategory = (typeof PRODUCT_CATEGORIES)[number];

const BY_NORMALIZED_LABEL = new Map<string, ProductCategory>(
  PRODUCT_CATEGORIES.map((c) => [normalizeLabel(c), c]),
);

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Map a loosely-cased label ("running shoes ") onto the taxonomy, if it belongs there */
export function resolveCategory(label: string): ProductCategory | undefined {
  return BY_NORMALIZED_LABEL.get(normalizeLabel(label));
}
