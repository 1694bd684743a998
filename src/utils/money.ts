/**
 * Round a monetary amount to two decimals, half away from zero.
 *
 * Applied at every point an amount is computed so that floating point drift
 * never carries from one aggregation step into the next.
 */
export function roundAmount(amount: number): number {
  const rounded = Math.round(Math.abs(amount) * 100) / 100;
  // normalise -0 so that it never prints as "-0.00"
  return amount < 0 && rounded !== 0 ? -rounded : rounded;
}

/** Two-decimal string used for every currency amount in the document */
export function formatAmount(amount: number): string {
  return roundAmount(amount).toFixed(2);
}

/** Fraction digits kept for quantities and unrounded prices */
const MAX_DECIMALS = 10;

/**
 * Plain decimal notation (xsd:decimal), never exponent form.
 * Trailing zeros are dropped: 10 -> "10", 1e-7 -> "0.0000001".
 */
export function formatDecimal(value: number): string {
  // toFixed switches to exponent form from 1e21, where every double is an integer
  if (Math.abs(value) >= 1e21) {
    return BigInt(value).toString();
  }

  const fixed = value.toFixed(MAX_DECIMALS);
  const trimmed = fixed.replace(/0+$/, '').replace(/\.$/, '');
  return trimmed === '-0' ? '0' : trimmed;
}

/**
 * Unit prices are written as given: two decimals when that is exact,
 * otherwise the full value so that quantity * price still matches the line amount.
 */
export function formatPrice(price: number): string {
  const fixed = price.toFixed(2);
  return Number(fixed) === price ? fixed : formatDecimal(price);
}

export function formatPercent(rate: number): string {
  return rate.toFixed(2);
}

/**
 * Tax rates are keyed as integer basis points so that 6 and 6.0000001 group together
 */
export function toBasisPoints(rate: number): number {
  return Math.round(rate * 100);
}

export function fromBasisPoints(basisPoints: number): number {
  return basisPoints / 100;
}
