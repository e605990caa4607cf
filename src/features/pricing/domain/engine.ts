/**
 * Price Evaluation Engine
 *
 * Pure orchestrator: priced rows → excessive filter → inexequible filter
 * → problems → statistics. Serializable result, ready for reports.
 */

import { PROBLEM_MESSAGES } from '../constants';
import { hasPrice, toThresholdPct } from './guards';
import { applyRounding } from './rounding';
import {
  collectProblems,
  computeStatistics,
  flagExcessivelyHigh,
  flagInexequible,
  selectMethod,
} from './rules';
import type {
  ClassifiedQuotation,
  EvaluationResult,
  PriceEvaluationInput,
  Quotation,
} from './types';

export function runPriceEvaluation(input: PriceEvaluationInput): EvaluationResult {
  const { context } = input;

  const priced: ClassifiedQuotation[] = input.quotations
    .filter(hasPrice)
    .map((q): ClassifiedQuotation => ({ ...q, status: 'valid', note: '' }));

  if (priced.length === 0) {
    return { outcome: 'empty', classified: [], problems: [] };
  }

  const afterExcess = flagExcessivelyHigh(priced, toThresholdPct(context.excess_threshold_pct));
  const classified = flagInexequible(afterExcess, toThresholdPct(context.inexequible_threshold_pct));

  const valid = classified.filter(q => q.status === 'valid');
  const problems = collectProblems(valid);

  if (valid.length === 0) {
    problems.push(PROBLEM_MESSAGES.NO_VALID_PRICE);
    return { outcome: 'no_valid_price', classified, problems };
  }

  const stats = computeStatistics(valid);
  const suggested_method = selectMethod(stats.coefficient_of_variation);
  const rawMarketPrice = suggested_method === 'mean' ? stats.mean : stats.median;
  const round = (value: number) =>
    applyRounding(value, context.decimal_places, context.use_nbr_rounding);

  return {
    outcome: 'computed',
    classified,
    problems,
    mean: round(stats.mean),
    median: stats.median,
    std_dev: stats.std_dev,
    coefficient_of_variation: stats.coefficient_of_variation,
    suggested_method,
    market_price: round(rawMarketPrice),
    cheapest_valid: stats.cheapest,
  };
}

/**
 * Positional form of {@link runPriceEvaluation}.
 */
export function evaluate(
  quotations: ReadonlyArray<Quotation>,
  excessThresholdPct: number,
  inexequibleThresholdPct: number,
  decimalPlaces = 2,
  useNbrRounding = true
): EvaluationResult {
  return runPriceEvaluation({
    quotations,
    context: {
      excess_threshold_pct: excessThresholdPct,
      inexequible_threshold_pct: inexequibleThresholdPct,
      decimal_places: decimalPlaces,
      use_nbr_rounding: useNbrRounding,
    },
  });
}
