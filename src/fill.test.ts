import { describe, it, expect } from "vitest";
import { MAX_AMOUNT } from "./constants";
import { createCurve, snapshot } from "./curve";
import { kindOf } from "./test-helpers";
import {
  assetOutGivenQuoteIn,
  mint,
  quoteBuy,
  quoteInGivenAssetOut,
  quoteMint,
  simulateMints,
} from "./fill";

describe("Curve Operations", () => {
  // k = 4e16, x0 = 4e7, y0 = 1e9, vt = 2e8
  const curve = createCurve({
    totalSupply: 1_000_000_000n,
    sellAmount: 800_000_000n,
    vt: 200_000_000n,
    mcTargetSats: 1_000_000_000n,
  });

  describe("mint", () => {
    it("should fill 1M sats from step 0", () => {
      // y' = floor(4e16 / 41e6) = 975609756
      expect(mint(curve, 0n, 1_000_000n)).toEqual({
        newStep: 24_390_244n,
        assetOut: 24_390_244n,
      });
    });

    it("should fill a single sat", () => {
      // floor(4e16 / 40000001) = 999999975
      expect(mint(curve, 0n, 1n)).toEqual({ newStep: 25n, assetOut: 25n });
    });

    it("should continue from a later step", () => {
      // y' = floor(4e16 / 42e6) = 952380952
      expect(mint(curve, 24_390_244n, 1_000_000n)).toEqual({
        newStep: 47_619_048n,
        assetOut: 23_228_804n,
      });
    });

    it("should match the snapshot difference when not clamped", () => {
      const { newStep, assetOut } = mint(curve, 24_390_244n, 1_000_000n);
      expect(assetOut).toBe(snapshot(curve, 24_390_244n).y - snapshot(curve, newStep).y);
    });

    it("should clamp at the virtual reserve", () => {
      expect(mint(curve, 0n, 10n ** 18n)).toEqual({ newStep: 800_000_000n, assetOut: 800_000_000n });
    });

    it("should sell out exactly with the total raise", () => {
      expect(mint(curve, 0n, 160_000_000n)).toEqual({
        newStep: 800_000_000n,
        assetOut: 800_000_000n,
      });
    });

    it("should return nothing once sold out", () => {
      expect(mint(curve, 800_000_000n, 1_000_000n)).toEqual({ newStep: 800_000_000n, assetOut: 0n });
      expect(mint(curve, 800_000_000n, 1n)).toEqual({ newStep: 800_000_000n, assetOut: 0n });
    });

    it("should reject zero input", () => {
      expect(kindOf(() => mint(curve, 0n, 0n))).toBe("ZeroInput");
      expect(kindOf(() => mint(curve, 800_000_001n, 0n))).toBe("ZeroInput");
    });

    it("should reject steps past sellAmount", () => {
      expect(kindOf(() => mint(curve, 800_000_001n, 1n))).toBe("OutOfRange");
    });

    it("should reject X + quoteIn overflow", () => {
      expect(kindOf(() => mint(curve, 0n, MAX_AMOUNT))).toBe("InvalidConfig");
    });

    it("should reject negative input", () => {
      expect(kindOf(() => mint(curve, 0n, -5n))).toBe("InvalidConfig");
    });

    it("should never sell more than sellAmount over repeated fills", () => {
      let step = 0n;
      let sold = 0n;
      for (let i = 0; i < 100 && step < curve.sellAmount; i++) {
        const result = mint(curve, step, 5_000_000n);
        sold += result.assetOut;
        step = result.newStep;
      }
      expect(step).toBe(curve.sellAmount);
      expect(sold).toBeLessThanOrEqual(curve.sellAmount);
      expect(sold).toBe(800_000_000n);
    });
  });

  describe("assetOutGivenQuoteIn", () => {
    it("should return mint output", () => {
      expect(assetOutGivenQuoteIn(curve, 0n, 1_000_000n)).toBe(24_390_244n);
    });

    it("should be non-decreasing in quoteIn", () => {
      let prev = 0n;
      for (const q of [1n, 2n, 10n, 1_000n, 999_999n, 1_000_000n, 50_000_000n, 160_000_000n, 10n ** 12n]) {
        const out = assetOutGivenQuoteIn(curve, 0n, q);
        expect(out).toBeGreaterThanOrEqual(prev);
        prev = out;
      }
    });
  });

  describe("quoteInGivenAssetOut", () => {
    it("should return 0 for zero output", () => {
      expect(quoteInGivenAssetOut(curve, 0n, 0n)).toBe(0n);
    });

    it("should find the exact quote for a known fill", () => {
      expect(quoteInGivenAssetOut(curve, 0n, 24_390_244n)).toBe(1_000_000n);
      expect(quoteInGivenAssetOut(curve, 24_390_244n, 23_228_804n)).toBe(1_000_000n);
    });

    it("should return the minimal quote", () => {
      expect(quoteInGivenAssetOut(curve, 0n, 25n)).toBe(1n);
      expect(quoteInGivenAssetOut(curve, 0n, 26n)).toBe(2n);
      expect(assetOutGivenQuoteIn(curve, 0n, 999_999n)).toBeLessThan(24_390_244n);
    });

    it("should price the whole window at the total raise", () => {
      expect(quoteInGivenAssetOut(curve, 0n, 800_000_000n)).toBe(160_000_000n);
    });

    it("should reject requests beyond the virtual floor", () => {
      expect(kindOf(() => quoteInGivenAssetOut(curve, 0n, 800_000_001n))).toBe("ExceedsPool");
      expect(kindOf(() => quoteInGivenAssetOut(curve, 800_000_000n, 1n))).toBe("ExceedsPool");
    });

    it("should propagate OutOfRange", () => {
      expect(kindOf(() => quoteInGivenAssetOut(curve, 800_000_001n, 1n))).toBe("OutOfRange");
    });
  });

  describe("simulateMints", () => {
    it("should thread the step through each fill", () => {
      expect(simulateMints(curve, [1_000_000n, 1_000_000n])).toEqual([
        { step: 0n, assetOut: 24_390_244n },
        { step: 24_390_244n, assetOut: 23_228_804n },
      ]);
    });

    it("should return an empty list for no fills", () => {
      expect(simulateMints(curve, [])).toEqual([]);
    });

    it("should keep filling at zero output once sold out", () => {
      expect(simulateMints(curve, [10n ** 18n, 1n])).toEqual([
        { step: 0n, assetOut: 800_000_000n },
        { step: 800_000_000n, assetOut: 0n },
      ]);
    });

    it("should fail the whole batch on the first error", () => {
      expect(kindOf(() => simulateMints(curve, [1_000_000n, 0n, 1_000_000n]))).toBe("ZeroInput");
    });
  });

  describe("slippage quotes", () => {
    it("quoteMint should lower the minimum output", () => {
      expect(quoteMint(curve, 0n, 1_000_000n, 100)).toEqual({
        newStep: 24_390_244n,
        assetOut: 24_390_244n,
        minAssetOut: 24_146_341n,
      });
      expect(quoteMint(curve, 0n, 1_000_000n, 0).minAssetOut).toBe(24_390_244n);
      expect(quoteMint(curve, 0n, 1_000_000n, 10000).minAssetOut).toBe(0n);
    });

    it("quoteBuy should raise the maximum input", () => {
      expect(quoteBuy(curve, 0n, 24_390_244n, 100)).toEqual({
        quoteIn: 1_000_000n,
        maxQuoteIn: 1_010_000n,
      });
    });

    it("should default to 1% slippage", () => {
      expect(quoteMint(curve, 0n, 1_000_000n).minAssetOut).toBe(24_146_341n);
      expect(quoteBuy(curve, 0n, 24_390_244n).maxQuoteIn).toBe(1_010_000n);
    });

    it("should reject invalid slippage", () => {
      expect(kindOf(() => quoteMint(curve, 0n, 1n, -1))).toBe("InvalidConfig");
      expect(kindOf(() => quoteMint(curve, 0n, 1n, 10001))).toBe("InvalidConfig");
      expect(kindOf(() => quoteBuy(curve, 0n, 1n, 1.5))).toBe("InvalidConfig");
    });
  });
});
