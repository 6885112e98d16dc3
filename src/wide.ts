/**
 * Widening Arithmetic
 *
 * Products of two reserve-scale amounts overflow 128 bits, so they are
 * computed at 256 bits and narrowed back with an explicit check. Nothing here
 * wraps: every overflow is an `InvalidConfig` error.
 */

import { MAX_AMOUNT, MAX_WIDE } from "./constants";
import { invalidConfig } from "./errors";

/** Unsigned 128-bit quantity */
export type Amount = bigint;

/** Unsigned 256-bit intermediate value */
export type WideValue = bigint;

/**
 * Check that a value is a representable amount
 * @throws CurveError(InvalidConfig) if negative or wider than 128 bits
 */
export function assertAmount(value: bigint, name: string): Amount {
  if (value < 0n || value > MAX_AMOUNT) {
    throw invalidConfig(`${name} must be an unsigned 128-bit amount (got ${value})`);
  }
  return value;
}

/**
 * Exact product of two values (amount or wide)
 * @throws CurveError(InvalidConfig) if the product does not fit in 256 bits
 */
export function wideMultiply(a: WideValue, b: WideValue): WideValue {
  if (a < 0n || b < 0n) {
    throw invalidConfig("wideMultiply: operands must be non-negative");
  }
  const product = a * b;
  if (product > MAX_WIDE) {
    throw invalidConfig("wideMultiply: product overflows 256 bits");
  }
  return product;
}

/**
 * Floor division of wide values
 * @throws CurveError(InvalidConfig) on a zero divisor
 */
export function wideDivide(num: WideValue, den: WideValue): WideValue {
  if (den === 0n) {
    throw invalidConfig("wideDivide: division by zero");
  }
  return num / den;
}

/**
 * Narrow a wide value back to amount width
 * @throws CurveError(InvalidConfig) if any bit above 128 is set
 */
export function narrow(wide: WideValue): Amount {
  if (wide < 0n || wide > MAX_AMOUNT) {
    throw invalidConfig("narrow: value does not fit in 128 bits");
  }
  return wide;
}

/**
 * 128-bit addition that fails instead of wrapping
 */
export function checkedAdd(a: Amount, b: Amount): Amount {
  const sum = a + b;
  if (sum > MAX_AMOUNT) {
    throw invalidConfig("checkedAdd: sum overflows 128 bits");
  }
  return sum;
}

export function saturatingAdd(a: Amount, b: Amount): Amount {
  const sum = a + b;
  return sum > MAX_AMOUNT ? MAX_AMOUNT : sum;
}

export function saturatingSub(a: Amount, b: Amount): Amount {
  return a > b ? a - b : 0n;
}

export function saturatingMul(a: Amount, b: Amount): Amount {
  const product = a * b;
  return product > MAX_AMOUNT ? MAX_AMOUNT : product;
}
