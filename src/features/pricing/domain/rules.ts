/**
 * Pricing Domain Rules
 *
 * Pure computations with no side effects: leave-one-out filters,
 * descriptive statistics and research problem checks.
 */

import {
  MEAN_CV_LIMIT_PCT,
  MIN_PUBLIC_SOURCE_PRICES,
  MIN_VALID_PRICES,
  NOTE_MESSAGES,
  PROBLEM_MESSAGES,
  PUBLIC_SOURCE_KINDS,
} from '../constants';
import { comparePeerShare } from './decimal';
import type {
  ClassifiedQuotation,
  Money,
  Percent,
  PriceStatistics,
  StatisticalMethod,
} from './types';

const MIN_PEERS = 2;

function sum(values: ReadonlyArray<number>): number {
  return values.reduce((acc, v) => acc + v, 0);
}

export function peersOf(prices: ReadonlyArray<Money>, index: number): Money[] {
  return prices.filter((_, i) => i !== index);
}

/**
 * Mean of every price except the one at `index`.
 * Undefined unless at least two other prices exist.
 */
export function leaveOneOutMean(prices: ReadonlyArray<Money>, index: number): Money | null {
  const peers = peersOf(prices, index);
  if (peers.length < MIN_PEERS) return null;
  return sum(peers) / peers.length;
}

function formatPct(value: Percent): string {
  return value.toFixed(2);
}

/**
 * Step 1: every row is compared with the mean of all the others,
 * all computed against the set as it entered the filter.
 */
export function flagExcessivelyHigh(
  rows: ReadonlyArray<ClassifiedQuotation>,
  excessThresholdPct: Percent
): ClassifiedQuotation[] {
  const prices = rows.map(r => r.price);

  return rows.map((row, i): ClassifiedQuotation => {
    const peers = peersOf(prices, i);
    if (peers.length >= MIN_PEERS && comparePeerShare(row.price, peers, excessThresholdPct, 100) > 0) {
      return { ...row, status: 'excessively_high', note: NOTE_MESSAGES.excessivelyHigh() };
    }
    return row;
  });
}

/**
 * Step 2: only rows still valid take part, both as candidates and as peers.
 * Public sources keep their status and get an explanatory note instead.
 */
export function flagInexequible(
  rows: ReadonlyArray<ClassifiedQuotation>,
  inexequibleThresholdPct: Percent
): ClassifiedQuotation[] {
  const validIndexes = rows.flatMap((r, i) => (r.status === 'valid' ? [i] : []));
  const prices = validIndexes.map(i => rows[i].price);

  const result = [...rows];
  validIndexes.forEach((rowIndex, k) => {
    const row = rows[rowIndex];
    const meanOthers = leaveOneOutMean(prices, k);
    if (meanOthers === null) return;
    if (comparePeerShare(row.price, peersOf(prices, k), inexequibleThresholdPct) >= 0) return;

    const pct = formatPct(meanOthers > 0 ? (row.price / meanOthers) * 100 : 0);
    const updated: ClassifiedQuotation = PUBLIC_SOURCE_KINDS.has(row.source_kind)
      ? { ...row, note: NOTE_MESSAGES.acceptedPublicSource(pct) }
      : { ...row, status: 'inexequible', note: NOTE_MESSAGES.inexequible(pct) };
    result[rowIndex] = updated;
  });
  return result;
}

export function collectProblems(valid: ReadonlyArray<ClassifiedQuotation>): string[] {
  const problems: string[] = [];

  if (valid.length < MIN_VALID_PRICES) {
    problems.push(PROBLEM_MESSAGES.FEWER_THAN_MIN_VALID);
  }

  const publicCount = valid.filter(q => PUBLIC_SOURCE_KINDS.has(q.source_kind)).length;
  if (publicCount === 0) {
    problems.push(PROBLEM_MESSAGES.NO_PUBLIC_SOURCE);
  } else if (publicCount < MIN_PUBLIC_SOURCE_PRICES) {
    problems.push(PROBLEM_MESSAGES.FEW_PUBLIC_SOURCES);
  }

  return problems;
}

export function median(values: ReadonlyArray<number>): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Population standard deviation (ddof = 0). */
export function populationStdDev(values: ReadonlyArray<number>, mean: number): number {
  if (values.length < 2) return 0;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/** First occurrence wins on ties. */
export function cheapestOf<T extends { readonly price: Money }>(rows: ReadonlyArray<T>): T {
  return rows.reduce((best, row) => (row.price < best.price ? row : best));
}

/** Expects a non-empty set. */
export function computeStatistics(valid: ReadonlyArray<ClassifiedQuotation>): PriceStatistics {
  const prices = valid.map(q => q.price);
  const mean = sum(prices) / prices.length;
  const std_dev = populationStdDev(prices, mean);

  return {
    mean,
    median: median(prices),
    std_dev,
    coefficient_of_variation: mean > 0 ? (std_dev / mean) * 100 : 0,
    cheapest: cheapestOf(valid),
  };
}

export function selectMethod(coefficientOfVariation: Percent): StatisticalMethod {
  return coefficientOfVariation <= MEAN_CV_LIMIT_PCT ? 'mean' : 'median';
}
