/**
 * Read-only curve analytics: raise, market cap and progress.
 */

import { PERCENT_DENOMINATOR } from "./constants";
import { type Curve, snapshot } from "./curve";
import { invalidConfig } from "./errors";
import {
  type Amount,
  assertAmount,
  checkedAdd,
  narrow,
  saturatingMul,
  saturatingSub,
  wideDivide,
  wideMultiply,
} from "./wide";

/**
 * Sats raised from step 0 up to `step`
 */
export function cumulativeQuoteToStep(curve: Curve, step: Amount): Amount {
  const snap = snapshot(curve, step);
  return saturatingSub(snap.x, curve.x0);
}

/**
 * Sats raised if the whole window [0, sellAmount] sells: floor(k / vt) - x0
 */
export function totalRaiseSats(curve: Curve): Amount {
  const xFinal = curve.k / curve.vt;
  return saturatingSub(xFinal, curve.x0);
}

/**
 * Fully diluted market cap at a step: price(step) * totalSupply
 * @throws CurveError(InvalidConfig) if the market cap does not fit in 128 bits
 */
export function mcSatsAtStep(curve: Curve, step: Amount): Amount {
  const snap = snapshot(curve, step);
  if (snap.y === 0n) {
    throw invalidConfig("mcSatsAtStep: token reserve is zero");
  }

  const num = wideMultiply(snap.x, curve.totalSupply);
  return narrow(wideDivide(num, snap.y));
}

export function finalMcSats(curve: Curve): Amount {
  return mcSatsAtStep(curve, curve.sellAmount);
}

/**
 * Whole-percent progress of `step` against totalSupply.
 *
 * Note: divides by totalSupply, not sellAmount, so a curve that sells less
 * than the full supply tops out below 100.
 */
export function progressAtStep(curve: Curve, step: Amount): Amount {
  assertAmount(step, "step");
  return saturatingMul(step, PERCENT_DENOMINATOR) / curve.totalSupply;
}

/**
 * product(steps) / sum(steps), floored.
 *
 * @throws CurveError(InvalidConfig) on an empty or all-zero input, or if the product overflows
 */
export function avgProgess(_curve: Curve, steps: readonly Amount[]): Amount {
  let product = 1n;
  let sum = 0n;
  for (const step of steps) {
    assertAmount(step, "step");
    product = narrow(product * step);
    sum = checkedAdd(sum, step);
  }
  if (sum === 0n) {
    throw invalidConfig("avgProgess: steps must have a non-zero sum");
  }
  return product / sum;
}
