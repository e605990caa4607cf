/**
 * Pricing Domain Guards
 *
 * Non-destructive sanitization of numeric values.
 * Issues are collected, never thrown.
 */

import { DEFAULT_DECIMAL_PLACES, MAX_DECIMAL_PLACES } from '../constants';
import type { Money, PriceIssue, PricedQuotation, Quotation } from './types';

export function isFiniteNumber(n: unknown): n is number {
  return typeof n === 'number' && Number.isFinite(n);
}

export function hasPrice(q: Quotation): q is PricedQuotation {
  return isFiniteNumber(q.price);
}

export function toNonNegativePrice(
  value: unknown,
  issuePath: string,
  issues: PriceIssue[]
): Money | null {
  if (value === null || value === undefined) return null;
  if (!isFiniteNumber(value)) {
    issues.push({
      code: 'NON_FINITE_NUMBER',
      message: 'Non-finite numeric value ignored',
      path: issuePath,
    });
    return null;
  }
  if (value < 0) {
    issues.push({
      code: 'NEGATIVE_PRICE_IGNORED',
      message: 'Negative price ignored',
      path: issuePath,
    });
    return null;
  }
  return value;
}

export function clampDecimalPlaces(places: number | undefined): number {
  if (!isFiniteNumber(places)) return DEFAULT_DECIMAL_PLACES;
  return Math.min(MAX_DECIMAL_PLACES, Math.max(0, Math.trunc(places)));
}

/** Thresholds are validated by callers; the engine only keeps them non-negative. */
export function toThresholdPct(value: number): number {
  return isFiniteNumber(value) && value > 0 ? value : 0;
}
