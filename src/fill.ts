/**
 * Curve Operations
 *
 * Forward fills (sats in -> tokens out), the inverse solver and batch
 * simulation. The caller owns `step`; every function here is pure.
 */

import { BPS_DENOMINATOR, DEFAULT_SLIPPAGE_BPS, MAX_AMOUNT, MAX_SLIPPAGE_BPS } from "./constants";
import { type Curve, xFromY, yAt } from "./curve";
import { exceedsPool, invalidConfig, zeroInput } from "./errors";
import {
  type Amount,
  assertAmount,
  checkedAdd,
  saturatingAdd,
  saturatingSub,
} from "./wide";

export interface MintResult {
  /** Step after the purchase */
  newStep: Amount;
  /** Tokens received */
  assetOut: Amount;
}

export interface SimulatedMint {
  /** Step before this purchase */
  step: Amount;
  assetOut: Amount;
}

export interface MintQuote extends MintResult {
  /** assetOut reduced by the slippage tolerance */
  minAssetOut: Amount;
}

export interface BuyCost {
  /** Minimal sats that buy the requested tokens */
  quoteIn: Amount;
  /** quoteIn raised by the slippage tolerance */
  maxQuoteIn: Amount;
}

/**
 * Buy tokens with sats at a given step
 *
 * Y' = floor(k / (X + quoteIn)), never below vt.
 *
 * @throws CurveError(ZeroInput) if quoteIn is zero
 * @throws CurveError(OutOfRange) if step is past sellAmount
 * @throws CurveError(InvalidConfig) if X + quoteIn overflows
 */
export function mint(curve: Curve, step: Amount, quoteIn: Amount): MintResult {
  assertAmount(quoteIn, "quoteIn");
  if (quoteIn === 0n) {
    throw zeroInput("mint: quoteIn must be non-zero");
  }

  const y = yAt(curve, step);
  const x = xFromY(curve, y);

  const x2 = checkedAdd(x, quoteIn);

  // Don't touch the virtual reserve
  const yRaw = curve.k / x2;
  const yPrime = yRaw < curve.vt ? curve.vt : yRaw;

  const assetOut = saturatingSub(y, yPrime);

  const advanced = saturatingAdd(step, assetOut);
  const newStep = advanced < curve.sellAmount ? advanced : curve.sellAmount;

  return { newStep, assetOut };
}

export function assetOutGivenQuoteIn(curve: Curve, step: Amount, quoteIn: Amount): Amount {
  return mint(curve, step, quoteIn).assetOut;
}

/**
 * Minimal sats that buy at least `assetOut` tokens at `step`
 *
 * Output is non-decreasing in quoteIn, so a lower-bound binary search over
 * [1, maxQuote] finds the minimum in O(log maxQuote) mints.
 *
 * @throws CurveError(ExceedsPool) if fewer than assetOut tokens remain above vt
 */
export function quoteInGivenAssetOut(curve: Curve, step: Amount, assetOut: Amount): Amount {
  assertAmount(assetOut, "assetOut");
  if (assetOut === 0n) return 0n;

  const y = yAt(curve, step);
  const maxTokens = saturatingSub(y, curve.vt);
  if (assetOut > maxTokens) {
    throw exceedsPool(
      `quoteInGivenAssetOut: ${assetOut} requested but only ${maxTokens} remain`
    );
  }

  const x = xFromY(curve, y);
  const xFinal = curve.k / curve.vt;
  if (xFinal < x) {
    throw invalidConfig("quoteInGivenAssetOut: final reserve below current reserve");
  }
  const maxQuote = xFinal - x;
  if (maxQuote === 0n) {
    throw exceedsPool("quoteInGivenAssetOut: no quote capacity left");
  }

  let lo = 1n;
  let hi = maxQuote;

  while (lo < hi) {
    const mid = lo + (hi - lo) / 2n;
    const out = assetOutGivenQuoteIn(curve, step, mid);
    if (out >= assetOut) {
      hi = mid;
    } else {
      lo = mid + 1n;
    }
  }

  return lo;
}

/**
 * Replay a sequence of purchases from step 0
 *
 * The first failing purchase aborts the whole batch.
 */
export function simulateMints(curve: Curve, mints: readonly Amount[]): SimulatedMint[] {
  let currentStep = 0n;
  const results: SimulatedMint[] = [];

  for (const quoteIn of mints) {
    const { newStep, assetOut } = mint(curve, currentStep, quoteIn);
    results.push({ step: currentStep, assetOut });
    currentStep = newStep;
  }

  return results;
}

// ============================================
// Slippage Quotes
// ============================================

/**
 * Validate slippage bounds
 * @throws CurveError(InvalidConfig) if slippage is not an integer in [0, 10000]
 */
function validateSlippageBps(slippageBps: number): bigint {
  if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > MAX_SLIPPAGE_BPS) {
    throw invalidConfig(
      `Invalid slippageBps: ${slippageBps}. Must be an integer between 0 and ${MAX_SLIPPAGE_BPS}`
    );
  }
  return BigInt(slippageBps);
}

/**
 * Fill with a minimum acceptable output
 */
export function quoteMint(
  curve: Curve,
  step: Amount,
  quoteIn: Amount,
  slippageBps: number = DEFAULT_SLIPPAGE_BPS
): MintQuote {
  const bps = validateSlippageBps(slippageBps);
  const result = mint(curve, step, quoteIn);
  const minAssetOut = (result.assetOut * (BPS_DENOMINATOR - bps)) / BPS_DENOMINATOR;
  return { ...result, minAssetOut };
}

/**
 * Cost of buying `assetOut` tokens with a maximum acceptable input
 */
export function quoteBuy(
  curve: Curve,
  step: Amount,
  assetOut: Amount,
  slippageBps: number = DEFAULT_SLIPPAGE_BPS
): BuyCost {
  const bps = validateSlippageBps(slippageBps);
  const quoteIn = quoteInGivenAssetOut(curve, step, assetOut);
  const raised = (quoteIn * (BPS_DENOMINATOR + bps)) / BPS_DENOMINATOR;
  return { quoteIn, maxQuoteIn: raised > MAX_AMOUNT ? MAX_AMOUNT : raised };
}
