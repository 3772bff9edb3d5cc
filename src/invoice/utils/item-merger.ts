import { InvoiceItem } from '../interfaces/invoice-item';

export function normalizeItemName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Folds incoming items into the existing list.
 *
 * A name already present (trimmed, case-insensitive) keeps its position and
 * display name, adds the incoming quantity and takes the incoming unit price.
 * Anything else is appended in arrival order. Neither input is mutated.
 */
export function mergeItems(
  existing: readonly InvoiceItem[],
  incoming: readonly InvoiceItem[],
): InvoiceItem[] {
  const merged = [...existing];
  const positions = new Map<string, number>();
  merged.forEach((item, index) => {
    const key = normalizeItemName(item.name);
    if (!positions.has(key)) {
      positions.set(key, index);
    }
  });

  for (const item of incoming) {
    const key = normalizeItemName(item.name);
    const position = positions.get(key);
    if (position === undefined) {
      positions.set(key, merged.length);
      merged.push({ ...item, name: item.name.trim() });
      continue;
    }
    const current = merged[position];
    merged[position] = {
      name: current.name,
      quantity: current.quantity + item.quantity,
      unitPrice: item.unitPrice,
    };
  }

  return merged;
}
