import type { PairedSitesSource } from "../types/pairedSites.js";
import { pairedSitesOf } from "../types/pairedSites.js";
import { PrematureClosureError, UnconsumedOpeningsError, type ClassifierError } from "./errors.js";
import { err, ok, type Result } from "../utils/result.js";

/**
 * Returns true when any two base pairs cross (i < k < j < l).
 *
 * Works on the paired sites alone, ignoring any bracket classes. The two
 * error kinds flag an array whose closings do not match its openings in
 * left-to-right order; they are not a crossing signal.
 *
 * @example
 * isPseudoknotted(unwrap(decodeDotBracket("<<<..((.>>>....))"))) // ok: true
 */
export function isPseudoknotted(source: PairedSitesSource): Result<boolean, ClassifierError> {
  const paired = pairedSitesOf(source);
  const stack: number[] = [];

  for (let i = 0; i < paired.length; i++) {
    const j = paired[i]!;
    if (j === 0) continue;
    if (j > i) {
      if (stack.length > 0 && stack[stack.length - 1]! <= j) return ok(true);
      stack.push(j);
    } else if (stack.length > 0) {
      stack.pop();
    } else {
      return err(new PrematureClosureError(i + 1));
    }
  }

  if (stack.length > 0) return err(new UnconsumedOpeningsError(stack.length));
  return ok(false);
}
