export * from './domain/types.js';
export { BROAD_CATEGORY_KEYWORDS, classifyProduct, classifyRows } from './domain/categories.js';
export {
  CURATED_COLORS,
  NEUTRAL_COLOR,
  rekeyColorTable,
  resolveCommodityColor,
  stripRankPrefix,
} from './domain/colors.js';
export { IngestionError, isIngestionError } from './errors.js';
export { loadExportReport, parseExportReport } from './ingest.js';
export {
  buildDashboard,
  findCuratedShortfalls,
  type CuratedShortfall,
  type Dashboard,
  type DashboardOptions,
} from './pipeline.js';
export { buildFigure, type FigureDocument } from './render/figure.js';
export { rankTopCommodities, renameCommodities, TOP_N } from './services/ranking.js';
export { sortByCategoryThenValue } from './services/ordering.js';
export { assembleSeries } from './services/series.js';
export { createDashboardServer } from './server.js';
export { loadConfig, type DashboardConfig } from './config.js';
