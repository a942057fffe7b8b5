import type {
  BroadCategory,
  ColorTable,
  FilterGroup,
  NamedRow,
  SeriesPlan,
  SeriesPoint,
  Trace,
} from '../domain/types.js';
import { resolveCommodityColor } from '../domain/colors.js';
import { formatPeriod } from '../domain/formatters.js';

export const TREND_NAME = 'TOTAL Trend';
// Added to the commodity count so the trend ranks after every commodity.
export const TREND_LEGEND_OFFSET = 1000;
export const OVERVIEW_LABEL = 'Overview (Stacked)';

function toPoints(byPeriod: Map<string, number>): SeriesPoint[] {
  return Array.from(byPeriod.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([period, value]) => ({ period, value }));
}

function addTo(map: Map<string, number>, period: string, value: number | null) {
  map.set(period, (map.get(period) ?? 0) + (value ?? 0));
}

/**
 * Turns named rows and the canonical order into chart-ready series.
 * Traces come out lowest-value first so that bottom-up stacking puts the
 * largest commodity on top; `legendRank` restores highest-first in the legend.
 */
export function assembleSeries(rows: NamedRow[], colors: ColorTable, order: string[]): SeriesPlan {
  const monthly = new Map<string, Map<string, number>>();
  const totals = new Map<string, number>();
  const categories = new Map<string, BroadCategory>();

  rows.forEach((row) => {
    if (!categories.has(row.rankedName)) categories.set(row.rankedName, row.category);
    // Rows without a usable period still count towards ranking but cannot be plotted.
    if (!row.period) return;
    const period = formatPeriod(row.period);
    const series = monthly.get(row.rankedName) ?? new Map<string, number>();
    addTo(series, period, row.value);
    monthly.set(row.rankedName, series);
    addTo(totals, period, row.value);
  });

  const traces: Trace[] = [];
  for (let idx = order.length - 1; idx >= 0; idx--) {
    const name = order[idx];
    const category = categories.get(name);
    if (!category) continue;
    traces.push({
      name,
      category,
      points: toPoints(monthly.get(name) ?? new Map<string, number>()),
      color: resolveCommodityColor(name, colors),
      legendRank: idx,
    });
  }

  const trendPoints = toPoints(totals);
  const months = trendPoints.map((p) => p.period);

  return {
    months,
    traces,
    trend: { name: TREND_NAME, points: trendPoints, legendRank: order.length + TREND_LEGEND_OFFSET },
    filters: buildFilterGroups(traces),
  };
}

/**
 * One overview group plus one group per category (alphabetical). Vectors follow
 * trace order with the trend series last; the trend is visible in every group.
 */
export function buildFilterGroups(traces: Trace[]): FilterGroup[] {
  const overview: FilterGroup = {
    label: OVERVIEW_LABEL,
    visible: [...traces.map(() => true), true],
  };
  const categories = Array.from(new Set(traces.map((t) => t.category))).sort();
  return [
    overview,
    ...categories.map((category) => ({
      label: category,
      visible: [...traces.map((t) => t.category === category), true],
    })),
  ];
}
