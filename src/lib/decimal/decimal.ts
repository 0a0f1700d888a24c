import { DecimalError } from "./errors";

/**
 * 18-decimal fixed-point arithmetic over bigint.
 *
 * Every amount in the engine (prices, sizes, margins, rates) is an integer
 * scaled by {@link UNIT}. Products and quotients truncate toward zero, which is
 * bigint's native division behaviour.
 */

export const DECIMALS = 18;
export const UNIT = 10n ** BigInt(DECIMALS);

const INT256_MAX = 2n ** 255n - 1n;
const INT256_MIN = -(2n ** 255n);

const checked = (value: bigint, operation: string): bigint => {
  if (value > INT256_MAX || value < INT256_MIN) {
    throw new DecimalError(`${operation} result exceeds the signed 256-bit range`, "ARITHMETIC_OVERFLOW");
  }
  return value;
};

export const multiplyDecimal = (a: bigint, b: bigint): bigint =>
  checked((a * b) / UNIT, "multiplyDecimal");

export const divideDecimal = (a: bigint, b: bigint): bigint => {
  if (b === 0n) {
    throw new DecimalError("divideDecimal by zero", "DIVISION_BY_ZERO");
  }
  return checked((a * UNIT) / b, "divideDecimal");
};

export const abs = (value: bigint): bigint => (value < 0n ? -value : value);

export const min = (a: bigint, b: bigint): bigint => (a < b ? a : b);

export const max = (a: bigint, b: bigint): bigint => (a > b ? a : b);

export const clamp = (value: bigint, lower: bigint, upper: bigint): bigint =>
  min(max(value, lower), upper);

/** Zero counts as long, so a position closed from a long is on the same side. */
export const sameSide = (a: bigint, b: bigint): boolean => a >= 0n === b >= 0n;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Parses a base-10 string such as `"-12.5"` into fixed-point. Digits beyond
 * 18 decimal places are rejected rather than rounded.
 */
export const parseDecimal = (input: string): bigint => {
  const match = DECIMAL_PATTERN.exec(input.trim());
  if (!match) {
    throw new DecimalError(`Invalid decimal: "${input}"`, "INVALID_DECIMAL");
  }
  const [, sign, whole = "0", fraction = ""] = match;
  if (fraction.length > DECIMALS) {
    throw new DecimalError(`Too many decimal places: "${input}"`, "INVALID_DECIMAL");
  }
  const magnitude = BigInt(whole) * UNIT + BigInt(fraction.padEnd(DECIMALS, "0"));
  return checked(sign ? -magnitude : magnitude, "parseDecimal");
};

/** Renders fixed-point as a base-10 string without trailing zeros. */
export const formatDecimal = (value: bigint): string => {
  const magnitude = abs(value);
  const whole = magnitude / UNIT;
  const fraction = (magnitude % UNIT).toString().padStart(DECIMALS, "0").replace(/0+$/, "");
  const sign = value < 0n ? "-" : "";
  return fraction.length > 0 ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
};

/** Shorthand for whole or fractional literals, mostly in configuration and tests. */
export const toUnit = (value: string | number): bigint => parseDecimal(String(value));
