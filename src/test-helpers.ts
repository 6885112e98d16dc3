import { isCurveError } from "./errors";

/**
 * Run `fn` and report the kind of CurveError it threw, if any
 */
export function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return isCurveError(e) ? e.kind : "not a CurveError";
  }
  return undefined;
}
