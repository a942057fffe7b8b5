// Shared domain types
export const BROAD_CATEGORIES = [
  'Canola Complex',
  'Wheat Complex',
  'Barley Family',
  'Pulses Complex',
  'Potash',
  'Wood Pulp',
  'Soya Beans',
] as const;

export type BroadCategory = (typeof BROAD_CATEGORIES)[number];

export const UNCLASSIFIED = 'unclassified';

export type Classification = BroadCategory | typeof UNCLASSIFIED;

export type ExportRow = {
  commodityName: string;
  categoryCode: string;
  // First day of the month (UTC); null when the source period could not be parsed.
  period: Date | null;
  value: number | null;
  quantity: number | null;
  unitPrice: number | null;
  province: string;
};

export type ClassifiedRow = ExportRow & {
  category: BroadCategory;
};

export type NamedRow = ClassifiedRow & {
  rankedName: string;
};

export type ColorTable = ReadonlyMap<string, string>;

export type SeriesPoint = {
  period: string;
  value: number;
};

export type Trace = {
  name: string;
  category: BroadCategory;
  points: SeriesPoint[];
  color: string;
  legendRank: number;
};

export type TrendSeries = {
  name: string;
  points: SeriesPoint[];
  legendRank: number;
};

export type FilterGroup = {
  label: string;
  visible: boolean[];
};

export type SeriesPlan = {
  months: string[];
  // Stack draw order: lowest canonical value first.
  traces: Trace[];
  trend: TrendSeries;
  filters: FilterGroup[];
};

export type CommoditySummary = {
  rank: number | null;
  commodityName: string;
  rankedName: string;
  categoryCode: string;
  category: BroadCategory;
  totalValue: number;
  totalQuantity: number;
  color: string;
};

export type CategorySummary = {
  category: BroadCategory;
  totalValue: number;
  commodities: string[];
};
