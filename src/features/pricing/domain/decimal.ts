/**
 * Exact decimal arithmetic on the digits `String(value)` prints.
 *
 * Threshold comparisons run here so that a price sitting exactly on a
 * threshold (0.03 against 75% of 0.04) compares as a tie, whatever the
 * binary doubles say.
 */

export interface DecimalParts {
  readonly negative: boolean;
  /** Integer significand without leading zeros ("0" for zero). */
  readonly digits: string;
  /** value = digits × 10^exponent */
  readonly exponent: number;
}

const NUMBER_PATTERN = /^(\d+)(?:\.(\d+))?(?:e([+-]\d+))?$/;

/** Expects a finite number. */
export function toDecimalParts(value: number): DecimalParts {
  const negative = value < 0;
  const match = NUMBER_PATTERN.exec(String(Math.abs(value)));
  if (!match) {
    throw new RangeError(`Cannot read decimal digits of ${value}`);
  }
  const [, intPart, fracPart = '', expPart = '0'] = match;
  const digits = (intPart + fracPart).replace(/^0+/, '') || '0';
  return {
    negative,
    digits,
    exponent: Number(expPart) - fracPart.length,
  };
}

function scaleTo(parts: DecimalParts, exponent: number): bigint {
  const magnitude = BigInt(parts.digits) * 10n ** BigInt(parts.exponent - exponent);
  return parts.negative ? -magnitude : magnitude;
}

/**
 * Sign of `price × 100 − (basePct + pct) × mean(peers)`, computed exactly.
 * `basePct` must be an integer; `peers` must not be empty.
 */
export function comparePeerShare(
  price: number,
  peers: ReadonlyArray<number>,
  pct: number,
  basePct = 0
): -1 | 0 | 1 {
  const [priceParts, pctParts, ...peerParts] = [price, pct, ...peers].map(toDecimalParts);
  const exponent = Math.min(0, priceParts.exponent, pctParts.exponent, ...peerParts.map(p => p.exponent));
  const unit = 10n ** BigInt(-exponent);

  const peerSum = peerParts.reduce((acc, p) => acc + scaleTo(p, exponent), 0n);
  const lhs = scaleTo(priceParts, exponent) * BigInt(peers.length) * 100n * unit;
  const rhs = (BigInt(basePct) * unit + scaleTo(pctParts, exponent)) * peerSum;

  if (lhs > rhs) return 1;
  if (lhs < rhs) return -1;
  return 0;
}
