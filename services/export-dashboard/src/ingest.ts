import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { Logger } from 'pino';
import type { ExportRow } from './domain/types.js';
import { IngestionError } from './errors.js';

export const COLUMNS = {
  period: 'Period',
  commodity: 'Commodity',
  province: 'Province',
  value: 'Value ($)',
  quantity: 'Quantity',
} as const;

const REQUIRED_COLUMNS = [COLUMNS.period, COLUMNS.commodity, COLUMNS.province, COLUMNS.value];

export const DEFAULT_REGION = 'saskatchewan';

export type IngestOptions = {
  region?: string;
  logger?: Logger;
};

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

function monthStart(year: number, month: number): Date | null {
  if (!Number.isInteger(year) || month < 1 || month > 12) return null;
  return new Date(Date.UTC(year, month - 1, 1));
}

/**
 * Accepts YYYY-MM, YYYY-MM-DD, YYYY/MM, "Jan 2024", "January 2024" and "Jan-24".
 * Returns the first day of that month (UTC), or null.
 */
export function parsePeriod(raw: string | undefined): Date | null {
  const text = (raw ?? '').trim();
  if (!text) return null;

  const numeric = /^(\d{4})[-/](\d{1,2})(?:[-/]\d{1,2})?(?:[T ].*)?$/.exec(text);
  if (numeric) {
    return monthStart(Number(numeric[1]), Number(numeric[2]));
  }

  const named = /^([A-Za-z]{3,})\.?[\s-]+(\d{2}|\d{4})$/.exec(text);
  if (named) {
    const month = MONTHS.indexOf(named[1].slice(0, 3).toLowerCase()) + 1;
    const year = named[2].length === 2 ? 2000 + Number(named[2]) : Number(named[2]);
    return month === 0 ? null : monthStart(year, month);
  }

  return null;
}

/** "$1,234.50" → 1234.5; blanks and anything non-numeric → null. */
export function parseAmount(raw: string | undefined): number | null {
  const text = (raw ?? '').replace(/[$,\s]/g, '');
  if (!text) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/** Splits "1001.99 - Wheat, nes" into code and description on the first separator. */
export function splitCommodity(raw: string | undefined): { code: string; name: string } {
  const text = (raw ?? '').trim();
  const idx = text.indexOf(' - ');
  if (idx === -1) return { code: text, name: '' };
  return { code: text.slice(0, idx).trim(), name: text.slice(idx + 3).trim() };
}

function normalizeHeader(header: string): string {
  return header.replace(/\uFEFF/g, '').trim();
}

function dropTitleLine(text: string): string {
  const body = text.replace(/^\uFEFF/, '');
  const newline = body.indexOf('\n');
  return newline === -1 ? '' : body.slice(newline + 1);
}

export function parseExportReport(text: string, options: IngestOptions = {}): ExportRow[] {
  const region = (options.region ?? DEFAULT_REGION).trim().toLowerCase();

  // The first line of the export is a report title, not the header.
  const parsed = Papa.parse<Record<string, string | undefined>>(dropTitleLine(text), {
    header: true,
    skipEmptyLines: true,
    transformHeader: normalizeHeader,
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter((col) => !fields.includes(col));
  if (missing.length > 0) {
    throw new IngestionError(`export report is missing columns: ${missing.join(', ')}`);
  }
  if (parsed.errors.length > 0) {
    options.logger?.warn({ errors: parsed.errors.length, first: parsed.errors[0]?.message }, 'malformed csv rows');
  }

  const rows: ExportRow[] = [];
  for (const raw of parsed.data) {
    const province = (raw[COLUMNS.province] ?? '').trim();
    if (province.toLowerCase() !== region) continue;

    const { code, name } = splitCommodity(raw[COLUMNS.commodity]);
    const value = parseAmount(raw[COLUMNS.value]);
    const quantity = parseAmount(raw[COLUMNS.quantity]);
    rows.push({
      commodityName: name,
      categoryCode: code,
      period: parsePeriod(raw[COLUMNS.period]),
      value,
      quantity,
      unitPrice: quantity !== null && quantity > 0 && value !== null ? value / quantity : null,
      province,
    });
  }
  return rows;
}

export async function loadExportReport(filePath: string, options: IngestOptions = {}): Promise<ExportRow[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new IngestionError(`cannot read export report at ${filePath}`, { filePath, cause: err });
  }
  options.logger?.info({ filePath }, 'loading export report');
  const rows = parseExportReport(text, options);
  options.logger?.info({ filePath, rows: rows.length }, 'export report loaded');
  return rows;
}
