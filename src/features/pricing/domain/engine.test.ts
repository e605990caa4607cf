/**
 * Price Evaluation Engine Tests
 */

import { describe, it, expect } from 'vitest';
import { PROBLEM_MESSAGES } from '../constants';
import { evaluate, runPriceEvaluation } from './engine';
import type { EvaluationResult, Quotation, SourceKind } from './types';

function quote(price: number | null, source_kind: SourceKind = 'vendor', source_name = 'Vendor'): Quotation {
  return { source_name, source_kind, locator: `DOC-${source_name}`, price };
}

function expectComputed(res: EvaluationResult) {
  if (res.outcome !== 'computed') {
    throw new Error(`expected a computed evaluation, got ${res.outcome}`);
  }
  return res;
}

describe('Price Evaluation Engine', () => {
  it('should treat a single quotation as valid and trivially priced', () => {
    const res = expectComputed(evaluate([quote(100)], 25, 75));

    expect(res.classified).toHaveLength(1);
    expect(res.classified[0].status).toBe('valid');
    expect(res.mean).toBe(100);
    expect(res.median).toBe(100);
    expect(res.market_price).toBe(100);
    expect(res.std_dev).toBe(0);
    expect(res.coefficient_of_variation).toBe(0);
    expect(res.suggested_method).toBe('mean');
    expect(res.cheapest_valid.price).toBe(100);
    expect(res.problems).toEqual([
      PROBLEM_MESSAGES.FEWER_THAN_MIN_VALID,
      PROBLEM_MESSAGES.NO_PUBLIC_SOURCE,
    ]);
  });

  it('should flag an excessively high price and price from the remaining ones', () => {
    const res = expectComputed(evaluate([quote(100), quote(100), quote(1000)], 25, 75));

    expect(res.classified.map(q => q.status)).toEqual(['valid', 'valid', 'excessively_high']);
    expect(res.classified[2].note).toBe('Price excessively elevated.');
    expect(res.market_price).toBe(100);
    expect(res.mean).toBe(100);
  });

  it('should keep a low public-source price valid with a note', () => {
    const res = expectComputed(
      evaluate([quote(100), quote(100), quote(10, 'public_price_bank', 'Price Bank')], 100, 75)
    );

    expect(res.classified.map(q => q.status)).toEqual(['valid', 'valid', 'valid']);
    expect(res.classified[2].note).toBe(
      'Although below the inexequibility threshold (10.00% of the average), ' +
        'accepted as a price practiced by the public administration.'
    );
    expect(res.problems).toEqual([PROBLEM_MESSAGES.FEW_PUBLIC_SOURCES]);
    expect(res.mean).toBe(70);
    expect(res.suggested_method).toBe('median');
    expect(res.market_price).toBe(100);
    expect(res.cheapest_valid.source_name).toBe('Price Bank');
  });

  it('should mark the same low price inexequible for a non-public source', () => {
    const res = expectComputed(evaluate([quote(100), quote(100), quote(10, 'vendor', 'Cheap')], 100, 75));

    expect(res.classified.map(q => q.status)).toEqual(['valid', 'valid', 'inexequible']);
    expect(res.classified[2].note).toBe('Inexequible price (10.00% of the average of the other prices).');
    expect(res.market_price).toBe(100);
    expect(res.cheapest_valid.price).toBe(100);
    expect(res.problems).toEqual([
      PROBLEM_MESSAGES.FEWER_THAN_MIN_VALID,
      PROBLEM_MESSAGES.NO_PUBLIC_SOURCE,
    ]);
  });

  it('should use the mean at exactly 25% coefficient of variation', () => {
    const res = expectComputed(evaluate([quote(75), quote(125)], 25, 75));

    expect(res.std_dev).toBe(25);
    expect(res.coefficient_of_variation).toBe(25);
    expect(res.suggested_method).toBe('mean');
    expect(res.market_price).toBe(100);
  });

  it('should switch to the median just above 25% coefficient of variation', () => {
    const res = expectComputed(evaluate([quote(74.99), quote(125.01)], 25, 75));

    expect(res.coefficient_of_variation).toBeCloseTo(25.01, 6);
    expect(res.suggested_method).toBe('median');
    expect(res.market_price).toBe(100);
  });

  it('should not let an earlier exclusion change later comparisons', () => {
    const res = expectComputed(evaluate([quote(200), quote(100), quote(100), quote(130)], 25, 75));

    expect(res.classified.map(q => q.status)).toEqual(['excessively_high', 'valid', 'valid', 'valid']);
    expect(res.mean).toBe(110);
    expect(res.suggested_method).toBe('mean');
    expect(res.market_price).toBe(110);
    expect(res.problems).toEqual([PROBLEM_MESSAGES.NO_PUBLIC_SOURCE]);
  });

  it('should raise no problem with 3 valid public-source prices', () => {
    const res = expectComputed(
      evaluate(
        [quote(100, 'contract'), quote(101, 'public_price_bank'), quote(102, 'price_registry_record')],
        25,
        75
      )
    );
    expect(res.problems).toEqual([]);
    expect(res.market_price).toBe(101);
  });

  it('should round the market price and mean with the configured policy', () => {
    const quotations = [quote(10.125), quote(10.125), quote(10.125)];

    expect(expectComputed(evaluate(quotations, 25, 75)).market_price).toBe(10.12);
    expect(expectComputed(evaluate(quotations, 25, 75, 2, false)).market_price).toBe(10.13);
    expect(expectComputed(evaluate(quotations, 25, 75, 0)).mean).toBe(10);
    expect(expectComputed(evaluate(quotations, 25, 75, 9)).market_price).toBe(10.125);
  });

  it('should pick the first cheapest valid quotation on ties', () => {
    const res = expectComputed(
      evaluate([quote(50, 'vendor', 'A'), quote(50, 'vendor', 'B'), quote(60, 'vendor', 'C')], 25, 75)
    );
    expect(res.cheapest_valid.source_name).toBe('A');
  });

  it('should classify every priced quotation exactly once', () => {
    const res = evaluate(
      [
        quote(100),
        quote(null),
        quote(90),
        { source_name: 'X', source_kind: 'other', locator: '' },
        quote(95),
        quote(5),
      ],
      100,
      75
    );

    expect(res.classified.map(q => q.price)).toEqual([100, 90, 95, 5]);
    for (const q of res.classified) {
      expect(['valid', 'excessively_high', 'inexequible']).toContain(q.status);
    }
    expect(res.classified.map(q => q.status)).toEqual(['valid', 'valid', 'valid', 'inexequible']);
  });

  it('should return identical results for identical inputs', () => {
    const quotations = [quote(12.5), quote(13.75), quote(40), quote(11, 'contract')];
    const first = evaluate(quotations, 25, 75);
    const second = evaluate(quotations, 25, 75);
    expect(second).toEqual(first);
  });

  it('should not mutate caller-owned quotations', () => {
    const quotations = Object.freeze([Object.freeze(quote(100)), Object.freeze(quote(1000))]);
    const res = runPriceEvaluation({
      quotations,
      context: { excess_threshold_pct: 25, inexequible_threshold_pct: 75 },
    });

    expect(res.classified[0]).not.toBe(quotations[0]);
    expect(quotations[0]).toEqual(quote(100));
  });

  it('should return an empty result when there is nothing to analyze', () => {
    const none = evaluate([], 25, 75);
    const absent = evaluate([quote(null)], 25, 75);

    for (const res of [none, absent]) {
      expect(res.outcome).toBe('empty');
      expect(res.classified).toEqual([]);
      expect(res.problems).toEqual([]);
      expect('market_price' in res).toBe(false);
    }
  });

  it('should keep a price exactly at the inexequibility threshold valid', () => {
    const res = expectComputed(evaluate([quote(0.01), quote(0.04), quote(0.07), quote(0.03)], 1000, 75));

    expect(res.classified[3].status).toBe('valid');
    expect(res.classified[3].note).toBe('');
  });

  it('should report no valid price when every row is excluded', () => {
    const res = evaluate([quote(100), quote(100), quote(100)], 25, 200);

    expect(res.outcome).toBe('no_valid_price');
    expect(res.classified.map(q => q.status)).toEqual(['inexequible', 'inexequible', 'inexequible']);
    expect(res.classified[0].note).toBe('Inexequible price (100.00% of the average of the other prices).');
    expect(res.problems).toEqual([
      PROBLEM_MESSAGES.FEWER_THAN_MIN_VALID,
      PROBLEM_MESSAGES.NO_PUBLIC_SOURCE,
      PROBLEM_MESSAGES.NO_VALID_PRICE,
    ]);
    for (const field of ['mean', 'median', 'std_dev', 'market_price', 'cheapest_valid']) {
      expect(field in res).toBe(false);
    }
  });

  it('should treat negative thresholds as zero', () => {
    const res = expectComputed(evaluate([quote(100), quote(100), quote(101)], -10, -10));
    expect(res.classified.map(q => q.status)).toEqual(['valid', 'valid', 'excessively_high']);
  });
});
