/**
 * Business constants for the Pricing domain
 */

import type { SourceKind, StatisticalMethod } from './domain/types';

export const SOURCE_KINDS: ReadonlyArray<SourceKind> = [
  'vendor',
  'contract',
  'public_price_bank',
  'price_registry_record',
  'internet_research',
  'specialized_media',
  'other',
];

/**
 * Sources presumed administratively vetted: exempt from the inexequible
 * penalty and counted toward the public-source coverage check.
 */
export const PUBLIC_SOURCE_KINDS: ReadonlySet<SourceKind> = new Set<SourceKind>([
  'contract',
  'public_price_bank',
  'price_registry_record',
]);

/**
 * Labels accepted for each source kind, as typed in research spreadsheets.
 * Matching is case- and accent-insensitive.
 */
export const SOURCE_KIND_LABELS: Record<SourceKind, ReadonlyArray<string>> = {
  vendor: ['Fornecedor', 'Vendor', 'Supplier'],
  contract: ['Contrato', 'Contract'],
  public_price_bank: ['Banco de Preços/Comprasnet', 'Banco de Preços', 'Comprasnet', 'Public Price Bank'],
  price_registry_record: ['Ata de Registro de Preços', 'Price Registry Record'],
  internet_research: ['Pesquisa da Internet', 'Internet Research'],
  specialized_media: ['Mídia Especializada', 'Specialized Media'],
  other: ['Outros', 'Other'],
};

export const DEFAULT_EXCESS_THRESHOLD_PCT = 25;
export const DEFAULT_INEXEQUIBLE_THRESHOLD_PCT = 75;
export const DEFAULT_DECIMAL_PLACES = 2;
export const MAX_DECIMAL_PLACES = 7;

/** At or below this coefficient of variation (%) the mean is preferred. */
export const MEAN_CV_LIMIT_PCT = 25;

export const MIN_VALID_PRICES = 3;
export const MIN_PUBLIC_SOURCE_PRICES = 3;

export const PROBLEM_MESSAGES = {
  FEWER_THAN_MIN_VALID:
    'The research has fewer than 3 valid prices, which may reduce the reliability of the estimate.',
  NO_PUBLIC_SOURCE: 'No valid price from a public source was identified.',
  FEW_PUBLIC_SOURCES:
    'The research has fewer than 3 valid prices from public sources; supplement the research if possible.',
  NO_VALID_PRICE: 'No valid price was found to perform the calculation.',
} as const;

export const NOTE_MESSAGES = {
  excessivelyHigh: (): string => 'Price excessively elevated.',
  inexequible: (pct: string): string =>
    `Inexequible price (${pct}% of the average of the other prices).`,
  acceptedPublicSource: (pct: string): string =>
    `Although below the inexequibility threshold (${pct}% of the average), ` +
    'accepted as a price practiced by the public administration.',
} as const;

export const METHOD_LABELS: Record<StatisticalMethod | 'minimum', string> = {
  mean: 'MEAN',
  median: 'MEDIAN',
  minimum: 'MINIMUM PRICE',
};
