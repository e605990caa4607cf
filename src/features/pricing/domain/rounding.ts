/**
 * Monetary rounding.
 *
 * Values are rounded on their shortest decimal representation (the digits
 * `String(value)` prints), so 0.125 is treated as exactly 0.125 and not as
 * the binary double 0.12500000000000000694.
 *
 * NBR 5891: when the discarded part is exactly one half, the last kept digit
 * is rounded to even; otherwise to the nearest.
 */

import { toDecimalParts } from './decimal';
import { clampDecimalPlaces, isFiniteNumber } from './guards';

export type RoundingMode = 'half_even' | 'half_up';

function roundUpNeeded(kept: string, dropped: string, mode: RoundingMode): boolean {
  const first = dropped.charCodeAt(0) - 48;
  if (first !== 5) return first > 5;
  const exactHalf = /^0*$/.test(dropped.slice(1));
  if (!exactHalf || mode === 'half_up') return true;
  const lastKept = kept.charCodeAt(kept.length - 1) - 48;
  return lastKept % 2 === 1;
}

export function roundDecimal(value: number, decimalPlaces: number, mode: RoundingMode): number {
  if (!isFiniteNumber(value)) return value;
  const places = clampDecimalPlaces(decimalPlaces);
  const { negative, digits, exponent } = toDecimalParts(value);

  const cut = -(exponent + places);
  if (cut <= 0) return value;

  const padded = digits.padStart(cut + 1, '0');
  const kept = padded.slice(0, padded.length - cut);
  const dropped = padded.slice(padded.length - cut);

  let significand = BigInt(kept);
  if (roundUpNeeded(kept, dropped, mode)) significand += 1n;

  const result = Number(`${negative ? '-' : ''}${significand}e-${places}`);
  return result === 0 ? 0 : result;
}

/** Round half to even at the given precision (NBR 5891). */
export function roundNbr5891(value: number, decimalPlaces: number): number {
  return roundDecimal(value, decimalPlaces, 'half_even');
}

/** Conventional rounding: ties go away from zero. */
export function roundHalfUp(value: number, decimalPlaces: number): number {
  return roundDecimal(value, decimalPlaces, 'half_up');
}

export function applyRounding(
  value: number,
  decimalPlaces: number | undefined,
  useNbrRounding: boolean | undefined
): number {
  const places = clampDecimalPlaces(decimalPlaces);
  return useNbrRounding === false ? roundHalfUp(value, places) : roundNbr5891(value, places);
}
