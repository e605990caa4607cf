/**
 * Parsing of raw research rows into quotations.
 *
 * Typed replacement for silent coercion: every value that cannot be used
 * becomes an absent price plus an issue the caller can show.
 */

import { SOURCE_KINDS, SOURCE_KIND_LABELS } from '../constants';
import { hasPrice, toNonNegativePrice } from '../domain/guards';
import type { Money, PriceIssue, Quotation, SourceKind } from '../domain/types';

export interface RawQuotationRow {
  readonly source_name?: string | null;
  readonly source_kind?: string | null;
  readonly locator?: string | null;
  readonly price?: number | string | null;
}

export interface ParsedRows {
  readonly quotations: Quotation[];
  readonly issues: PriceIssue[];
}

const PLAIN_NUMBER = /^-?\d+(?:\.\d+)?$/;
// "1.234" or "1.234.567": dots grouping thousands, no decimal part
const DOT_GROUPED = /^-?[1-9]\d{0,2}(?:\.\d{3})+$/;

/**
 * Lowercase, strip accents and collapse whitespace.
 */
export const normalizeLabel = (label: string): string =>
  label
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();

const LABEL_INDEX: ReadonlyMap<string, SourceKind> = new Map(
  SOURCE_KINDS.flatMap(kind => [
    [normalizeLabel(kind), kind] as const,
    ...SOURCE_KIND_LABELS[kind].map(label => [normalizeLabel(label), kind] as const),
  ])
);

/**
 * Convert "R$ 1.234,56", "1234,56", "1.234" or "1,234.56" to canonical
 * "1234.56". Without a comma, dots in groups of three are thousands
 * separators.
 */
export const normalizeNumericText = (text: string): string => {
  const compact = text.replace(/R\$/gi, '').replace(/\s/g, '');
  const lastComma = compact.lastIndexOf(',');
  const lastDot = compact.lastIndexOf('.');

  if (lastComma === -1) return DOT_GROUPED.test(compact) ? compact.replace(/\./g, '') : compact;
  if (lastDot > lastComma) return compact.replace(/,/g, '');
  return compact.replace(/\./g, '').replace(',', '.');
};

export function parsePrice(raw: unknown, path: string, issues: PriceIssue[]): Money | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return toNonNegativePrice(raw, path, issues);

  if (typeof raw === 'string') {
    if (raw.trim() === '') return null;
    const text = normalizeNumericText(raw);
    if (PLAIN_NUMBER.test(text)) {
      return toNonNegativePrice(Number(text), path, issues);
    }
  }

  issues.push({
    code: 'NON_NUMERIC_PRICE',
    message: `Price "${String(raw)}" is not a number and was ignored`,
    path,
  });
  return null;
}

export function parseSourceKind(raw: unknown, path: string, issues: PriceIssue[]): SourceKind {
  const kind = typeof raw === 'string' ? LABEL_INDEX.get(normalizeLabel(raw)) : undefined;
  if (kind) return kind;

  issues.push({
    code: 'UNKNOWN_SOURCE_KIND',
    message: `Unknown source kind "${String(raw ?? '')}", treated as other`,
    path,
  });
  return 'other';
}

export function parseQuotationRows(rows: ReadonlyArray<RawQuotationRow>): ParsedRows {
  const issues: PriceIssue[] = [];

  const quotations = rows.map((row, i): Quotation => ({
    source_name: (row.source_name ?? '').trim(),
    source_kind: parseSourceKind(row.source_kind, `rows[${i}].source_kind`, issues),
    locator: (row.locator ?? '').trim(),
    price: parsePrice(row.price, `rows[${i}].price`, issues),
  }));

  return { quotations, issues };
}

/**
 * Ascending by price, absent prices last; ties keep their order.
 */
export function sortByPrice<T extends Quotation>(quotations: ReadonlyArray<T>): T[] {
  return [...quotations].sort((a, b) => {
    if (hasPrice(a) && hasPrice(b)) return a.price - b.price;
    if (hasPrice(a)) return -1;
    if (hasPrice(b)) return 1;
    return 0;
  });
}
