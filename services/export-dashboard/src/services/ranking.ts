import type { ClassifiedRow, ColorTable, NamedRow } from '../domain/types.js';
import { rekeyColorTable } from '../domain/colors.js';

export const TOP_N = 10;

/**
 * Sums `value` per commodity in first-seen order. Null values add nothing but
 * the commodity is still registered.
 */
export function totalValueByCommodity(rows: ClassifiedRow[]): Map<string, number> {
  const totals = new Map<string, number>();
  rows.forEach((row) => {
    totals.set(row.commodityName, (totals.get(row.commodityName) ?? 0) + (row.value ?? 0));
  });
  return totals;
}

/** Highest total value first; equal totals keep the order commodities were first seen. */
export function rankTopCommodities(rows: ClassifiedRow[], limit = TOP_N): string[] {
  return Array.from(totalValueByCommodity(rows).entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([name]) => name);
}

export function formatRankedName(rawName: string, code: string, rank: number | null): string {
  const label = `[${code}] ${rawName}`;
  return rank === null ? label : `(Top ${rank}) ${label}`;
}

export function buildRankedNames(rows: ClassifiedRow[], top: string[]): Map<string, string> {
  const codes = new Map<string, string>();
  rows.forEach((row) => {
    if (!codes.has(row.commodityName)) codes.set(row.commodityName, row.categoryCode);
  });

  const ranks = new Map<string, number>();
  top.forEach((name, idx) => ranks.set(name, idx + 1));

  const names = new Map<string, string>();
  codes.forEach((code, rawName) => {
    names.set(rawName, formatRankedName(rawName, code, ranks.get(rawName) ?? null));
  });
  return names;
}

export function applyRankedNames(rows: ClassifiedRow[], rankedNames: ReadonlyMap<string, string>): NamedRow[] {
  return rows.map((row) => ({
    ...row,
    rankedName: rankedNames.get(row.commodityName) ?? row.commodityName,
  }));
}

export type RenameResult = {
  rows: NamedRow[];
  rankedNames: Map<string, string>;
  colors: ColorTable;
};

export function renameCommodities(rows: ClassifiedRow[], top: string[], colors: ColorTable): RenameResult {
  // The color table is rebuilt only after the full rename map exists.
  const rankedNames = buildRankedNames(rows, top);
  return {
    rows: applyRankedNames(rows, rankedNames),
    rankedNames,
    colors: rekeyColorTable(colors, rankedNames),
  };
}
