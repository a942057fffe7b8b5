import {
  UNCLASSIFIED,
  type BroadCategory,
  type Classification,
  type ClassifiedRow,
  type ExportRow,
} from './types.js';

// Scanned in declaration order; the first category with a matching keyword wins,
// so a wheat/barley blend lands in Wheat Complex.
export const BROAD_CATEGORY_KEYWORDS: ReadonlyArray<readonly [BroadCategory, readonly string[]]> = [
  ['Canola Complex', ['rape', 'colza', 'canola']],
  ['Wheat Complex', ['wheat', 'durum']],
  ['Barley Family', ['barley']],
  ['Pulses Complex', ['pea', 'lentil', 'chickpea']],
  ['Potash', ['potassium', 'potash']],
  ['Wood Pulp', ['wood', 'pulp']],
  ['Soya Beans', ['soya']],
];

// HS heading 1514 covers rapeseed/colza oils; some descriptions only carry the code.
const CANOLA_OIL_HEADING = '1514';

export function classifyProduct(name: string): Classification {
  const s = name.toLowerCase();

  if (s.includes(CANOLA_OIL_HEADING) && s.includes('oil')) {
    return 'Canola Complex';
  }

  for (const [category, keywords] of BROAD_CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => s.includes(keyword))) {
      return category;
    }
  }

  return UNCLASSIFIED;
}

export type ClassificationResult = {
  rows: ClassifiedRow[];
  initialCount: number;
  retainedCount: number;
};

export function classifyRows(rows: ExportRow[]): ClassificationResult {
  const classified: ClassifiedRow[] = [];
  for (const row of rows) {
    const category = classifyProduct(row.commodityName);
    if (category === UNCLASSIFIED) continue;
    classified.push({ ...row, category });
  }
  return { rows: classified, initialCount: rows.length, retainedCount: classified.length };
}
