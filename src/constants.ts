/**
 * Shared constants used across the bonding curve math.
 *
 * Amounts are unsigned 128-bit integers; intermediate products are carried
 * at 256 bits before being narrowed back.
 */

// ============================================
// Width Constants
// ============================================

/** Bit width of an amount (token base units or sats) */
export const AMOUNT_BITS = 128n;

/** Bit width of intermediate products */
export const WIDE_BITS = 256n;

/** Largest representable amount (2^128 - 1) */
export const MAX_AMOUNT = (1n << AMOUNT_BITS) - 1n;

/** Largest representable wide value (2^256 - 1) */
export const MAX_WIDE = (1n << WIDE_BITS) - 1n;

// ============================================
// Ratios
// ============================================

/** Progress is reported in whole percent */
export const PERCENT_DENOMINATOR = 100n;

/** Basis points denominator (10000 = 100%) */
export const BPS_DENOMINATOR = 10000n;

/** Default slippage in basis points (100 = 1%) */
export const DEFAULT_SLIPPAGE_BPS = 100;

/** Maximum allowed slippage in basis points (10000 = 100%) */
export const MAX_SLIPPAGE_BPS = 10000;
