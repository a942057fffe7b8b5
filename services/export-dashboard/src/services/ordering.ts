import type { BroadCategory, CategorySummary, NamedRow } from '../domain/types.js';

function sumBy<K>(rows: NamedRow[], key: (row: NamedRow) => K): Map<K, number> {
  const totals = new Map<K, number>();
  rows.forEach((row) => {
    const k = key(row);
    totals.set(k, (totals.get(k) ?? 0) + (row.value ?? 0));
  });
  return totals;
}

function descending<K>(totals: Map<K, number>): K[] {
  return Array.from(totals.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([k]) => k);
}

/**
 * Categories by total value, and within each category its commodities by total value.
 * Ties keep first-seen order.
 */
export function summarizeCategories(rows: NamedRow[]): CategorySummary[] {
  const categoryTotals = sumBy(rows, (row) => row.category);
  const byCategory = new Map<BroadCategory, NamedRow[]>();
  rows.forEach((row) => {
    const bucket = byCategory.get(row.category) ?? [];
    bucket.push(row);
    byCategory.set(row.category, bucket);
  });

  return descending(categoryTotals).map((category) => ({
    category,
    totalValue: categoryTotals.get(category) ?? 0,
    commodities: descending(sumBy(byCategory.get(category) ?? [], (row) => row.rankedName)),
  }));
}

/** Canonical visual-importance order of ranked names, highest first. */
export function sortByCategoryThenValue(rows: NamedRow[]): string[] {
  return summarizeCategories(rows).flatMap((c) => c.commodities);
}
