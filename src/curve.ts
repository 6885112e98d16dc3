/**
 * Virtual-Reserve Curve Model
 *
 * Constant-product curve with a virtual token reserve:
 *
 *   X * Y = k
 *   Y(step) = vt + (sellAmount - step)
 *   X(step) = floor(k / Y(step))
 *
 * X0 is derived from the desired fully diluted valuation at completion:
 *
 *   mcTarget ≈ (X0 * Y0 / vt^2) * totalSupply
 *   => X0 = floor(mcTarget * vt^2 / (Y0 * totalSupply))
 */

import { invalidConfig, outOfRange } from "./errors";
import {
  type Amount,
  assertAmount,
  checkedAdd,
  narrow,
  wideDivide,
  wideMultiply,
} from "./wide";

/**
 * Curve parameters supplied by the caller
 */
export interface CurveConfig {
  /** Total token supply */
  totalSupply: Amount;
  /** Tokens sold over the curve */
  sellAmount: Amount;
  /** Virtual token reserve */
  vt: Amount;
  /** Fully diluted valuation at completion, in sats */
  mcTargetSats: Amount;
}

/**
 * Immutable curve with derived invariants
 */
export interface Curve {
  readonly totalSupply: Amount;
  readonly sellAmount: Amount;
  readonly vt: Amount;
  /** Token-side reserve at step 0 (vt + sellAmount) */
  readonly y0: Amount;
  /** Sats-side reserve at step 0 */
  readonly x0: Amount;
  /** Constant-product invariant x0 * y0 */
  readonly k: Amount;
}

/**
 * Reserve state at a step
 */
export interface CurveSnapshot {
  /** Tokens sold so far */
  step: Amount;
  /** Sats-side reserve */
  x: Amount;
  /** Token-side reserve (vt + remaining real tokens) */
  y: Amount;
}

/**
 * Build a curve from an FDV target
 * @throws CurveError(InvalidConfig) if a parameter is zero or an invariant does not fit
 */
export function createCurve(config: CurveConfig): Curve {
  const totalSupply = assertAmount(config.totalSupply, "totalSupply");
  const sellAmount = assertAmount(config.sellAmount, "sellAmount");
  const vt = assertAmount(config.vt, "vt");
  const mc = assertAmount(config.mcTargetSats, "mcTargetSats");

  if (totalSupply === 0n || sellAmount === 0n || vt === 0n || mc === 0n) {
    throw invalidConfig("createCurve: totalSupply, sellAmount, vt and mcTargetSats must be non-zero");
  }

  const y0 = checkedAdd(vt, sellAmount);

  const num = wideMultiply(mc, wideMultiply(vt, vt));
  const den = wideMultiply(y0, totalSupply);
  const x0 = narrow(wideDivide(num, den));
  if (x0 === 0n) {
    throw invalidConfig("createCurve: derived x0 is zero, raise mcTargetSats or vt");
  }

  const k = narrow(wideMultiply(x0, y0));

  return Object.freeze({ totalSupply, sellAmount, vt, y0, x0, k });
}

/**
 * Last reachable step (the whole sellable window)
 */
export function maxStep(curve: Curve): Amount {
  return curve.sellAmount;
}

/**
 * Token-side reserve at a step
 * @throws CurveError(OutOfRange) if step is negative or past sellAmount
 */
export function yAt(curve: Curve, step: Amount): Amount {
  if (step < 0n || step > curve.sellAmount) {
    throw outOfRange(`yAt: step ${step} outside [0, ${curve.sellAmount}]`);
  }
  return checkedAdd(curve.vt, curve.sellAmount - step);
}

/**
 * Sats-side reserve for a token-side reserve
 * @throws CurveError(InvalidConfig) if y is zero
 */
export function xFromY(curve: Curve, y: Amount): Amount {
  if (y === 0n) {
    throw invalidConfig("xFromY: token reserve is zero");
  }
  return curve.k / y;
}

export function snapshot(curve: Curve, step: Amount): CurveSnapshot {
  const y = yAt(curve, step);
  const x = xFromY(curve, y);
  return { step, x, y };
}

/** Price numerator: sats per token is x / y */
export function priceNum(snap: CurveSnapshot): Amount {
  return snap.x;
}

/** Price denominator */
export function priceDen(snap: CurveSnapshot): Amount {
  return snap.y;
}
