import type { ColorTable } from './types.js';

export const NEUTRAL_COLOR = '#A0A0A0';

// Highest rank tried when stripping "(Top N) " prefixes.
export const MAX_RANK_PREFIX = 10;

// Curated palette keyed by the raw commodity description.
// Hues are grouped by family: canola warm, wheat blue, barley green, pulses earth,
// potash purple, wood pulp brown, soya cyan.
export const CURATED_COLORS: ColorTable = new Map(Object.entries({
  // Canola Complex
  'Rape/colza seeds,low erucic acid, for oil extraction, w/n broken': '#C62828',
  'Rape/colza seed oil-cake & o solid residue, low erucic acid, w/n ground/pellet': '#EF6C00',
  'Low erucic acid rape (canola) or colza oil and its fractions, crude': '#FFB300',
  'Low erucic acid rape (canola) or colza oil and its fractions, refined': '#FFD600',

  // Wheat Complex
  'Red spring wheat, o/t certified organic, grade 1, o/t seed for sowing': '#1565C0',
  'Red spring wheat, o/t certified organic, grade 2, o/t seed for sowing': '#42A5F5',
  'Durum wheat, o/t certified organic, o/t seed for sowing': '#455A64',

  // Barley Family
  'Barley, for malting, o/t seed for sowing': '#2E7D32',
  'Barley, o/t certified organic, o/t seed for sowing or malting': '#81C784',

  // Pulses Complex
  'Peas, yellow, nes, dried, shelled, w/n skinned': '#F9A825',
  'Peas, green, nes, dried, shelled, w/n skinned': '#CDDC39',
  'Lentils, dried, shelled, w/n skinned': '#795548',

  // Potash
  'Potassium chloride, in packages weighing more than 10 kg': '#9C27B0',

  // Others
  'Wood pulp, obtained by a combination of mechanical & chemical pulping processes': '#5D4037',
  'Soya beans,o/t certified organic,for oil extraction,w/n broken,o/t seed f sowing': '#00BCD4',
}));

/**
 * Builds a new table in which every raw key present in `rankedNames` is stored
 * under its ranked display name. Keys without a ranked name are kept as they are.
 * Call only once the rename map covers every commodity.
 */
export function rekeyColorTable(table: ColorTable, rankedNames: ReadonlyMap<string, string>): ColorTable {
  const rekeyed = new Map<string, string>();
  for (const [key, color] of table) {
    rekeyed.set(rankedNames.get(key) ?? key, color);
  }
  return rekeyed;
}

const CODE_PREFIX = /^\[[^\]]*\] /;

/** Removes a leading "(Top N) [code] ", "(Top N) " or "[code] " label. */
export function stripRankPrefix(name: string): string {
  let rest = name;
  for (let rank = 1; rank <= MAX_RANK_PREFIX; rank++) {
    const prefix = `(Top ${rank}) `;
    if (rest.startsWith(prefix)) {
      rest = rest.slice(prefix.length);
      break;
    }
  }
  return rest.replace(CODE_PREFIX, '');
}

function hasAny(s: string, needles: string[]): boolean {
  return needles.some((needle) => s.includes(needle));
}

function fuzzyColor(name: string): string | null {
  const s = name.toLowerCase();

  if (hasAny(s, ['rape', 'colza', 'canola'])) {
    if (s.includes('seed') && !s.includes('oil')) return '#C62828';
    if (hasAny(s, ['cake', 'residue'])) return '#EF6C00';
    if (s.includes('crude')) return '#FFB300';
    if (s.includes('refined')) return '#FFD600';
    return '#C62828';
  }

  if (s.includes('wheat')) {
    if (hasAny(s, ['grade 1', 'grade1'])) return '#1565C0';
    if (hasAny(s, ['grade 2', 'grade2'])) return '#42A5F5';
    if (s.includes('durum')) return '#455A64';
    return '#1565C0';
  }

  if (s.includes('barley')) {
    return s.includes('malting') ? '#2E7D32' : '#81C784';
  }

  if (s.includes('pea')) {
    if (s.includes('yellow')) return '#F9A825';
    if (s.includes('green')) return '#CDDC39';
    return '#F9A825';
  }
  if (s.includes('lentil')) return '#795548';

  if (hasAny(s, ['potassium', 'potash'])) return '#9C27B0';
  if (hasAny(s, ['wood pulp', 'pulp'])) return '#5D4037';
  if (hasAny(s, ['soya', 'soy'])) return '#00BCD4';

  return null;
}

export function resolveCommodityColor(displayName: string, table: ColorTable): string {
  const exact = table.get(displayName);
  if (exact !== undefined) return exact;

  const clean = stripRankPrefix(displayName);
  const stripped = table.get(clean);
  if (stripped !== undefined) return stripped;

  return fuzzyColor(clean) ?? NEUTRAL_COLOR;
}
