/**
 * Error taxonomy for the curve engine.
 *
 * The set of kinds is closed. Every failing operation throws a `CurveError`
 * and composed operations let it propagate unchanged.
 */

export type CurveErrorKind = "InvalidConfig" | "OutOfRange" | "ZeroInput" | "ExceedsPool";

export const CURVE_ERROR_KINDS: readonly CurveErrorKind[] = [
  "InvalidConfig",
  "OutOfRange",
  "ZeroInput",
  "ExceedsPool",
];

export class CurveError extends Error {
  readonly kind: CurveErrorKind;

  constructor(kind: CurveErrorKind, message: string) {
    super(message);
    this.name = "CurveError";
    this.kind = kind;
  }
}

/**
 * Narrow an unknown thrown value to a `CurveError`, optionally of one kind
 */
export function isCurveError(value: unknown, kind?: CurveErrorKind): value is CurveError {
  return value instanceof CurveError && (kind === undefined || value.kind === kind);
}

export function invalidConfig(message: string): CurveError {
  return new CurveError("InvalidConfig", message);
}

export function outOfRange(message: string): CurveError {
  return new CurveError("OutOfRange", message);
}

export function zeroInput(message: string): CurveError {
  return new CurveError("ZeroInput", message);
}

export function exceedsPool(message: string): CurveError {
  return new CurveError("ExceedsPool", message);
}
