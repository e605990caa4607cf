/**
 * Pricing Domain Types
 *
 * Canonical contract for the market price evaluation engine.
 * Immutable, readonly types with no UI dependency.
 */

export type Money = number;
export type Percent = number;

export type SourceKind =
  | 'vendor'
  | 'contract'
  | 'public_price_bank'
  | 'price_registry_record'
  | 'internet_research'
  | 'specialized_media'
  | 'other';

export type PriceStatus = 'valid' | 'excessively_high' | 'inexequible';

export type StatisticalMethod = 'mean' | 'median';

export interface Quotation {
  readonly source_name: string;
  readonly source_kind: SourceKind;
  /** Free-text document reference; never read by the engine. */
  readonly locator: string;
  readonly price?: Money | null;
}

/** A quotation whose price survived the presence check. */
export interface PricedQuotation extends Quotation {
  readonly price: Money;
}

export interface ClassifiedQuotation extends PricedQuotation {
  readonly status: PriceStatus;
  readonly note: string;
}

export interface EvaluationContext {
  readonly excess_threshold_pct: Percent;
  readonly inexequible_threshold_pct: Percent;
  /** Clamped to [0, 7]. */
  readonly decimal_places?: number;
  /** Round half to even (NBR 5891) when true, half up otherwise. */
  readonly use_nbr_rounding?: boolean;
}

export interface PriceEvaluationInput {
  readonly quotations: ReadonlyArray<Quotation>;
  readonly context: EvaluationContext;
}

interface EvaluationBase {
  readonly classified: ReadonlyArray<ClassifiedQuotation>;
  readonly problems: ReadonlyArray<string>;
}

/** Nothing to analyze: no quotation carried a price. */
export interface EmptyEvaluation extends EvaluationBase {
  readonly outcome: 'empty';
}

/** Every priced quotation was excluded by the filters. */
export interface NoValidPriceEvaluation extends EvaluationBase {
  readonly outcome: 'no_valid_price';
}

export interface ComputedEvaluation extends EvaluationBase {
  readonly outcome: 'computed';
  readonly mean: Money;
  readonly median: Money;
  readonly std_dev: Money;
  readonly coefficient_of_variation: Percent;
  readonly suggested_method: StatisticalMethod;
  readonly market_price: Money;
  readonly cheapest_valid: ClassifiedQuotation;
}

export type EvaluationResult =
  | EmptyEvaluation
  | NoValidPriceEvaluation
  | ComputedEvaluation;

export interface PriceStatistics {
  readonly mean: Money;
  readonly median: Money;
  readonly std_dev: Money;
  readonly coefficient_of_variation: Percent;
  readonly cheapest: ClassifiedQuotation;
}

export type PriceIssueCode =
  | 'NON_FINITE_NUMBER'
  | 'NON_NUMERIC_PRICE'
  | 'NEGATIVE_PRICE_IGNORED'
  | 'UNKNOWN_SOURCE_KIND';

/** Input problem found while turning raw rows into quotations. */
export interface PriceIssue {
  readonly code: PriceIssueCode;
  readonly message: string;
  readonly path?: string;
}
