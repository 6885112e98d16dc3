/**
 * Serialized host surface
 *
 * Wraps a curve for callers that cannot carry 128-bit integers natively
 * (JSON bodies, other runtimes). Every amount crosses this boundary as a
 * canonical decimal string; errors are the engine's `CurveError` unchanged.
 */
import type { Logger } from "winston";
import {
  avgProgess,
  cumulativeQuoteToStep,
  finalMcSats,
  mcSatsAtStep,
  progressAtStep,
  totalRaiseSats,
} from "../analytics";
import { type Curve, createCurve, maxStep, snapshot } from "../curve";
import { type CurveErrorKind, invalidConfig, isCurveError } from "../errors";
import { assetOutGivenQuoteIn, mint, quoteInGivenAssetOut, simulateMints } from "../fill";
import { createLogger } from "../logger";
import { type Amount, assertAmount } from "../wide";

// ============================================================================
// Types
// ============================================================================

export interface SerializedCurveConfig {
  totalSupply: string;
  sellAmount: string;
  vt: string;
  mcTargetSats: string;
}

export interface SerializedCurveOptions {
  /** Logger to use; one is created when omitted */
  logger?: Logger;
  /** Level for the created logger (defaults to CURVE_LOG_LEVEL, then "warn") */
  logLevel?: string;
}

export interface SerializedInvariants {
  y0: string;
  x0: string;
  k: string;
}

export interface SerializedSnapshot {
  step: string;
  x: string;
  y: string;
}

export interface SerializedMintResult {
  newStep: string;
  assetOut: string;
}

export interface SerializedSimulatedMint {
  step: string;
  assetOut: string;
}

// ============================================================================
// Encoding
// ============================================================================

const DECIMAL_PATTERN = /^[0-9]+$/;

/**
 * Parse a decimal string into an amount
 * @throws CurveError(InvalidConfig) if not a plain unsigned decimal within 128 bits
 */
export function parseAmount(value: string, name = "amount"): Amount {
  if (!DECIMAL_PATTERN.test(value)) {
    throw invalidConfig(`parseAmount: ${name} must be an unsigned decimal string (got "${value}")`);
  }
  return assertAmount(BigInt(value), name);
}

export function formatAmount(value: Amount): string {
  return value.toString();
}

/**
 * Map a thrown value to its error kind, or undefined if it is not a curve error
 */
export function errorCode(err: unknown): CurveErrorKind | undefined {
  return isCurveError(err) ? err.kind : undefined;
}

// ============================================================================
// SerializedCurve
// ============================================================================

export class SerializedCurve {
  readonly curve: Curve;
  private readonly logger: Logger;

  constructor(config: SerializedCurveConfig, options: SerializedCurveOptions = {}) {
    this.logger = options.logger ?? createLogger(options.logLevel, "curve-host");
    this.curve = this.run("createCurve", () =>
      createCurve({
        totalSupply: parseAmount(config.totalSupply, "totalSupply"),
        sellAmount: parseAmount(config.sellAmount, "sellAmount"),
        vt: parseAmount(config.vt, "vt"),
        mcTargetSats: parseAmount(config.mcTargetSats, "mcTargetSats"),
      })
    );
    this.logger.debug("curve created", {
      x0: formatAmount(this.curve.x0),
      y0: formatAmount(this.curve.y0),
      k: formatAmount(this.curve.k),
    });
  }

  maxStep(): string {
    return formatAmount(maxStep(this.curve));
  }

  invariants(): SerializedInvariants {
    return {
      y0: formatAmount(this.curve.y0),
      x0: formatAmount(this.curve.x0),
      k: formatAmount(this.curve.k),
    };
  }

  snapshot(step: string): SerializedSnapshot {
    return this.run("snapshot", () => {
      const snap = snapshot(this.curve, parseAmount(step, "step"));
      return { step: formatAmount(snap.step), x: formatAmount(snap.x), y: formatAmount(snap.y) };
    });
  }

  mint(step: string, quoteIn: string): SerializedMintResult {
    return this.run("mint", () => {
      const result = mint(this.curve, parseAmount(step, "step"), parseAmount(quoteIn, "quoteIn"));
      return { newStep: formatAmount(result.newStep), assetOut: formatAmount(result.assetOut) };
    });
  }

  assetOutGivenQuoteIn(step: string, quoteIn: string): string {
    return this.run("assetOutGivenQuoteIn", () =>
      formatAmount(
        assetOutGivenQuoteIn(this.curve, parseAmount(step, "step"), parseAmount(quoteIn, "quoteIn"))
      )
    );
  }

  quoteInGivenAssetOut(step: string, assetOut: string): string {
    return this.run("quoteInGivenAssetOut", () =>
      formatAmount(
        quoteInGivenAssetOut(this.curve, parseAmount(step, "step"), parseAmount(assetOut, "assetOut"))
      )
    );
  }

  simulateMints(mints: readonly string[]): SerializedSimulatedMint[] {
    return this.run("simulateMints", () =>
      simulateMints(
        this.curve,
        mints.map((m) => parseAmount(m, "mint"))
      ).map(({ step, assetOut }) => ({ step: formatAmount(step), assetOut: formatAmount(assetOut) }))
    );
  }

  cumulativeQuoteToStep(step: string): string {
    return this.run("cumulativeQuoteToStep", () =>
      formatAmount(cumulativeQuoteToStep(this.curve, parseAmount(step, "step")))
    );
  }

  totalRaiseSats(): string {
    return formatAmount(totalRaiseSats(this.curve));
  }

  mcSatsAtStep(step: string): string {
    return this.run("mcSatsAtStep", () =>
      formatAmount(mcSatsAtStep(this.curve, parseAmount(step, "step")))
    );
  }

  finalMcSats(): string {
    return this.run("finalMcSats", () => formatAmount(finalMcSats(this.curve)));
  }

  progressAtStep(step: string): string {
    return this.run("progressAtStep", () =>
      formatAmount(progressAtStep(this.curve, parseAmount(step, "step")))
    );
  }

  avgProgess(steps: readonly string[]): string {
    return this.run("avgProgess", () =>
      formatAmount(avgProgess(this.curve, steps.map((s) => parseAmount(s, "step"))))
    );
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this.logger.warn(`${operation} failed`, {
        kind: errorCode(err) ?? "unknown",
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }
}
