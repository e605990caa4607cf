/**
 * Item analysis: runs the evaluation for one researched item and derives
 * the values each analysis mode reports.
 *
 * Modes:
 * - standard: market value only
 * - contract_extension: market value against the currently contracted price
 * - price_map: market value against the best valid proposal
 */

import { PricingError } from '@/lib/errors';
import { createLogger, type Logger } from '@/lib/logger';
import { runPriceEvaluation } from '../domain/engine';
import { isFiniteNumber } from '../domain/guards';
import { applyRounding } from '../domain/rounding';
import type {
  ClassifiedQuotation,
  EvaluationContext,
  EvaluationResult,
  Money,
  Quotation,
  StatisticalMethod,
} from '../domain/types';
import { sortByPrice } from '../utils/parsing';

export type AnalysisMode = 'standard' | 'contract_extension' | 'price_map';

export type FinalMethod = StatisticalMethod | 'minimum';

/** How the contracted price compares with the market. */
export type ContractAssessment = 'negotiate' | 'advantageous' | 'equal';

export interface ItemDescriptor {
  readonly description: string;
  readonly unit: string;
  readonly quantity: number;
  readonly contracted_unit_price?: Money | null;
}

export interface ItemAnalysisInput {
  readonly mode: AnalysisMode;
  readonly item: ItemDescriptor;
  readonly quotations: ReadonlyArray<Quotation>;
  readonly context: EvaluationContext;
  /** Report the cheapest valid price instead of the statistical estimate. */
  readonly use_minimum_price?: boolean;
}

export interface ContractComparison {
  readonly unit_contracted: Money;
  readonly total_contracted: Money;
  readonly assessment: ContractAssessment;
}

export interface BestPriceInfo {
  readonly unit_best_price: Money;
  readonly total_best_price: Money;
  readonly source_name: string;
  readonly locator: string;
}

export interface PricedOutcome {
  readonly final_method: FinalMethod;
  readonly unit_market_value: Money;
  readonly total_market_value: Money;
  readonly contract: ContractComparison | null;
  readonly best_price: BestPriceInfo | null;
}

export interface ItemAnalysis {
  readonly mode: AnalysisMode;
  readonly item: ItemDescriptor;
  /** Input quotations, ascending by price. */
  readonly quotations: ReadonlyArray<Quotation>;
  readonly evaluation: EvaluationResult;
  readonly priced: PricedOutcome | null;
  readonly problems: ReadonlyArray<string>;
  readonly requires_justification: boolean;
}

export interface ItemRecord extends PricedOutcome {
  readonly item_num: number;
  readonly mode: AnalysisMode;
  readonly description: string;
  readonly unit: string;
  readonly quantity: number;
  readonly quotations: ReadonlyArray<Quotation>;
  readonly problems: ReadonlyArray<string>;
  readonly justification: string;
}

export interface AnalysisDeps {
  readonly logger?: Logger;
}

function isPercent(value: number): boolean {
  return isFiniteNumber(value) && value >= 0 && value <= 100;
}

export function validateItemInput(input: ItemAnalysisInput): void {
  const { item, context, mode } = input;
  const errors: string[] = [];

  if (item.description.trim() === '') {
    errors.push('description is required');
  }
  if (item.unit.trim() === '') {
    errors.push('unit is required');
  }
  if (!Number.isInteger(item.quantity) || item.quantity < 1) {
    errors.push('quantity must be an integer of at least 1');
  }
  if (!isPercent(context.excess_threshold_pct)) {
    errors.push('excess threshold must be within [0, 100]');
  }
  if (!isPercent(context.inexequible_threshold_pct)) {
    errors.push('inexequible threshold must be within [0, 100]');
  }
  if (
    mode === 'contract_extension' &&
    !(isFiniteNumber(item.contracted_unit_price) && item.contracted_unit_price > 0)
  ) {
    errors.push('contracted unit price must be greater than 0');
  }

  if (errors.length > 0) {
    throw new PricingError('VALIDATION_FAILED', `Invalid item: ${errors.join('; ')}`, { errors });
  }
}

export function assessContract(marketUnit: Money, contractedUnit: Money): ContractAssessment {
  if (marketUnit < contractedUnit) return 'negotiate';
  if (marketUnit > contractedUnit) return 'advantageous';
  return 'equal';
}

function derivePricedOutcome(
  input: ItemAnalysisInput,
  market_price: Money,
  suggested: StatisticalMethod,
  cheapest: ClassifiedQuotation
): PricedOutcome {
  const { item, context, mode } = input;
  const round = (value: number) =>
    applyRounding(value, context.decimal_places, context.use_nbr_rounding);

  const final_method: FinalMethod = input.use_minimum_price ? 'minimum' : suggested;
  const unit_market_value = round(input.use_minimum_price ? cheapest.price : market_price);

  let contract: ContractComparison | null = null;
  if (mode === 'contract_extension' && isFiniteNumber(item.contracted_unit_price)) {
    contract = {
      unit_contracted: item.contracted_unit_price,
      total_contracted: round(item.contracted_unit_price * item.quantity),
      assessment: assessContract(unit_market_value, item.contracted_unit_price),
    };
  }

  let best_price: BestPriceInfo | null = null;
  if (mode === 'price_map') {
    const unit_best_price = round(cheapest.price);
    best_price = {
      unit_best_price,
      total_best_price: round(unit_best_price * item.quantity),
      source_name: cheapest.source_name,
      locator: cheapest.locator,
    };
  }

  return {
    final_method,
    unit_market_value,
    total_market_value: round(unit_market_value * item.quantity),
    contract,
    best_price,
  };
}

export function analyzeItem(input: ItemAnalysisInput, deps: AnalysisDeps = {}): ItemAnalysis {
  const logger = deps.logger ?? createLogger('item-analysis');
  const startedAt = Date.now();

  validateItemInput(input);

  const quotations = sortByPrice(input.quotations);
  const evaluation = runPriceEvaluation({ quotations, context: input.context });

  const priced =
    evaluation.outcome === 'computed'
      ? derivePricedOutcome(
          input,
          evaluation.market_price,
          evaluation.suggested_method,
          evaluation.cheapest_valid
        )
      : null;

  const requires_justification = evaluation.problems.length > 0;

  const meta = {
    mode: input.mode,
    quotations: quotations.length,
    classified: evaluation.classified.length,
    outcome: evaluation.outcome,
    final_method: priced?.final_method,
    problems: evaluation.problems.length,
  };
  const entry = {
    op: 'analyze_item',
    status: requires_justification ? ('needs_justification' as const) : ('ok' as const),
    durationMs: Date.now() - startedAt,
    meta,
  };
  if (requires_justification) {
    logger.warn(entry);
  } else {
    logger.info(entry);
  }

  return {
    mode: input.mode,
    item: input.item,
    quotations,
    evaluation,
    priced,
    problems: evaluation.problems,
    requires_justification,
  };
}

/**
 * Build the record stored in the consolidated report.
 * Research problems must be justified before the item is kept, unless the
 * caller defers it (batch flow); the report then lists the item as pending.
 */
export function finalizeItem(
  analysis: ItemAnalysis,
  justification: string,
  itemNumber: number,
  options: { allowPendingJustification?: boolean } = {}
): ItemRecord {
  if (!analysis.priced) {
    throw new PricingError('NOTHING_TO_ANALYZE', 'The item has no market price to record', {
      outcome: analysis.evaluation.outcome,
    });
  }

  const text = justification.trim();
  if (analysis.requires_justification && text === '' && !options.allowPendingJustification) {
    throw new PricingError(
      'JUSTIFICATION_REQUIRED',
      'The research problems must be justified before the item is recorded',
      { problems: [...analysis.problems] }
    );
  }

  return {
    ...analysis.priced,
    item_num: itemNumber,
    mode: analysis.mode,
    description: analysis.item.description.trim(),
    unit: analysis.item.unit.trim(),
    quantity: analysis.item.quantity,
    quotations: analysis.quotations,
    problems: analysis.problems,
    justification: text,
  };
}
