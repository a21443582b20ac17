/** Decimal places for rates and period-over-period changes. */
export const RATE_PRECISION = 1;

/** Decimal places for generic ratios. */
export const RATIO_PRECISION = 2;

/**
 * Round half away from zero, like SQL `ROUND`.
 *
 * Shifts through the decimal exponent rather than multiplying, so `1.005`
 * rounds to `1.01` instead of falling to `1.00` on its binary representation.
 */
export function roundHalfAwayFromZero(value: number, digits: number): number {
  if (!Number.isFinite(value)) return value;
  const magnitude = Math.abs(value);
  const text = String(magnitude);
  let rounded: number;
  if (text.includes('e')) {
    const factor = 10 ** digits;
    rounded = Math.round(magnitude * factor) / factor;
  } else {
    rounded = Number(`${Math.round(Number(`${text}e${digits}`))}e-${digits}`);
  }
  const signed = value < 0 ? -rounded : rounded;
  // never hand back -0
  return signed === 0 ? 0 : signed;
}

/**
 * Divide, yielding `null` when the denominator is zero or either side is unknown.
 * A computation that is undefined is a value, not an exception.
 */
export function safeDivide(
  numerator: number | null | undefined,
  denominator: number | null | undefined
): number | null {
  if (numerator === null || numerator === undefined) return null;
  if (denominator === null || denominator === undefined || denominator === 0) return null;
  const quotient = numerator / denominator;
  return Number.isFinite(quotient) ? quotient : null;
}

/** `round(numerator / denominator * 100, digits)`, or `null` when undefined. */
export function ratioPct(
  numerator: number | null | undefined,
  denominator: number | null | undefined,
  digits: number = RATE_PRECISION
): number | null {
  const quotient = safeDivide(numerator, denominator);
  return quotient === null ? null : roundHalfAwayFromZero(quotient * 100, digits);
}

/** Relative change from `prior` to `current` in percent, or `null` when the prior is 0 or unknown. */
export function percentChange(
  current: number | null | undefined,
  prior: number | null | undefined,
  digits: number = RATE_PRECISION
): number | null {
  if (current === null || current === undefined) return null;
  if (prior === null || prior === undefined) return null;
  return ratioPct(current - prior, prior, digits);
}

/** Rounded ratio, or `null` when undefined. */
export function roundedRatio(
  numerator: number | null | undefined,
  denominator: number | null | undefined,
  digits: number = RATIO_PRECISION
): number | null {
  const quotient = safeDivide(numerator, denominator);
  return quotient === null ? null : roundHalfAwayFromZero(quotient, digits);
}
