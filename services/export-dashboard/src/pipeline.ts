import pino, { type Logger } from 'pino';
import { classifyProduct, classifyRows } from './domain/categories.js';
import { CURATED_COLORS, resolveCommodityColor } from './domain/colors.js';
import { formatCurrency } from './domain/formatters.js';
import {
  UNCLASSIFIED,
  type BroadCategory,
  type CategorySummary,
  type ColorTable,
  type CommoditySummary,
  type ExportRow,
  type NamedRow,
  type SeriesPlan,
} from './domain/types.js';
import { buildFigure, type FigureDocument } from './render/figure.js';
import { rankTopCommodities, renameCommodities, TOP_N } from './services/ranking.js';
import { sortByCategoryThenValue, summarizeCategories } from './services/ordering.js';
import { assembleSeries } from './services/series.js';

export type DashboardOptions = {
  title?: string;
  colors?: ColorTable;
  logger?: Logger;
};

export type Dashboard = {
  figure: FigureDocument;
  plan: SeriesPlan;
  order: string[];
  commodities: CommoditySummary[];
  categories: CategorySummary[];
  stats: { ingested: number; classified: number };
  shortfalls: CuratedShortfall[];
};

export type CuratedShortfall = {
  category: BroadCategory;
  products: number;
  curated: number;
};

/** Categories that resolved to fewer products than the palette has entries for. */
export function findCuratedShortfalls(categories: CategorySummary[], palette: ColorTable): CuratedShortfall[] {
  const curated = new Map<BroadCategory, number>();
  for (const key of palette.keys()) {
    const category = classifyProduct(key);
    if (category === UNCLASSIFIED) continue;
    curated.set(category, (curated.get(category) ?? 0) + 1);
  }
  return categories
    .map((c) => ({ category: c.category, products: c.commodities.length, curated: curated.get(c.category) ?? 0 }))
    .filter((c) => c.products < c.curated);
}

function summarizeCommodities(rows: NamedRow[], top: string[], colors: ColorTable): CommoditySummary[] {
  const ranks = new Map<string, number>();
  top.forEach((name, idx) => ranks.set(name, idx + 1));

  const map = new Map<string, CommoditySummary>();
  rows.forEach((row) => {
    if (!map.has(row.commodityName)) {
      map.set(row.commodityName, {
        rank: ranks.get(row.commodityName) ?? null,
        commodityName: row.commodityName,
        rankedName: row.rankedName,
        categoryCode: row.categoryCode,
        category: row.category,
        totalValue: 0,
        totalQuantity: 0,
        color: resolveCommodityColor(row.rankedName, colors),
      });
    }
    const entry = map.get(row.commodityName);
    if (!entry) return;
    entry.totalValue += row.value ?? 0;
    entry.totalQuantity += row.quantity ?? 0;
  });

  return Array.from(map.values()).sort((a, b) => b.totalValue - a.totalValue);
}

/** Runs classification, ranking, naming, ordering and series assembly over one row set. */
export function buildDashboard(input: ExportRow[], options: DashboardOptions = {}): Dashboard {
  const logger = options.logger ?? pino({ level: process.env.LOG_LEVEL || 'info' });

  const classified = classifyRows(input);
  logger.info(
    { retained: classified.retainedCount, total: classified.initialCount },
    'classification complete'
  );

  const top = rankTopCommodities(classified.rows, TOP_N);
  const palette = options.colors ?? CURATED_COLORS;
  const renamed = renameCommodities(classified.rows, top, palette);
  const order = sortByCategoryThenValue(renamed.rows);
  const plan = assembleSeries(renamed.rows, renamed.colors, order);

  const commodities = summarizeCommodities(renamed.rows, top, renamed.colors);
  const categories = summarizeCategories(renamed.rows);

  commodities
    .filter((c) => c.rank !== null)
    .forEach((c) => logger.info({ rank: c.rank, total: formatCurrency(c.totalValue) }, c.commodityName));
  categories.forEach((c) =>
    logger.info(
      { commodities: c.commodities.length, total: formatCurrency(c.totalValue) },
      `category ${c.category}`
    )
  );

  const shortfalls = findCuratedShortfalls(categories, palette);
  shortfalls.forEach((s) => logger.warn(s, 'category has fewer products than curated entries'));

  return {
    figure: buildFigure(plan, { title: options.title }),
    plan,
    order,
    commodities,
    categories,
    stats: { ingested: classified.initialCount, classified: classified.retainedCount },
    shortfalls,
  };
}
