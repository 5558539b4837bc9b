/**
 * Coerces a value to a finite number, falling back when invalid.
 */
export const toFiniteNumber = (value: unknown, fallback = 0): number => {
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

/**
 * Truncates toward zero at the given number of decimal places.
 * The scaled value is rounded to 12 significant digits first so that
 * 1.15 truncates to 1.15 rather than 1.14.
 */
export const truncateDecimals = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  const scaled = Number((value * factor).toPrecision(12));
  return Math.trunc(scaled) / factor;
};

/**
 * Returns true if `value` is an unsigned integer representable in `width` bits.
 */
export const fitsInBits = (value: number, width: number): boolean =>
  Number.isInteger(value) && value >= 0 && value < 2 ** width;
