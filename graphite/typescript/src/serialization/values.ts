/**
 * Numeric value formatting for the plaintext protocol.
 */

function formatNonFinite(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  return value > 0 ? '+Inf' : '-Inf';
}

/**
 * Format a value as a base-10 integer, truncating toward zero.
 */
export function formatInteger(value: number): string {
  if (!Number.isFinite(value)) {
    return formatNonFinite(value);
  }
  return BigInt(Math.trunc(value)).toString();
}

/**
 * Format a value with a fixed number of decimals.
 */
export function formatFixed(value: number, digits: number): string {
  if (!Number.isFinite(value)) {
    return formatNonFinite(value);
  }
  return value.toFixed(digits);
}

/**
 * Integer quotient of two integral values, truncated toward zero.
 */
export function formatQuotient(dividend: number, divisor: number): string {
  if (!Number.isFinite(dividend) || !Number.isFinite(divisor) || Math.trunc(divisor) === 0) {
    return formatNonFinite(dividend / divisor);
  }
  return (BigInt(Math.trunc(dividend)) / BigInt(Math.trunc(divisor))).toString();
}

/** Two decimals, used for rates, means and percentiles */
export const formatRate = (value: number): string => formatFixed(value, 2);

/** Six decimals, used for float gauges */
export const formatFloat = (value: number): string => formatFixed(value, 6);
