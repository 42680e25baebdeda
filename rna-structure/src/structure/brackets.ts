import { UnrecognizedSymbolError } from "./errors.js";
import { err, ok, type Result } from "../utils/result.js";

export const LEFT_BRACKETS = "(<{[ABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const RIGHT_BRACKETS = ")>}]abcdefghijklmnopqrstuvwxyz";

/**
 * Parallel left/right symbol lists. The class of a bracket is its position in
 * either list; lower classes are preferred when encoding.
 */
export interface BracketAlphabet {
  readonly left: readonly string[];
  readonly right: readonly string[];
  readonly size: number;
  leftClass(symbol: string): number;
  rightClass(symbol: string): number;
}

/**
 * Builds an alphabet from two equal-length strings of distinct symbols.
 * Throws RangeError when the lists cannot form a one-to-one pairing.
 */
export function createBracketAlphabet(left: string, right: string): BracketAlphabet {
  const lefts = Array.from(left);
  const rights = Array.from(right);
  if (lefts.length !== rights.length) {
    throw new RangeError(`Bracket lists differ in length: ${lefts.length} left, ${rights.length} right`);
  }
  if (lefts.length === 0) throw new RangeError("Bracket alphabet is empty");

  const leftToClass = new Map<string, number>();
  const rightToClass = new Map<string, number>();
  for (let k = 0; k < lefts.length; k++) {
    const l = lefts[k]!;
    const r = rights[k]!;
    if (leftToClass.has(l) || rightToClass.has(l)) throw new RangeError(`Duplicate bracket symbol '${l}'`);
    leftToClass.set(l, k);
    if (leftToClass.has(r) || rightToClass.has(r)) throw new RangeError(`Duplicate bracket symbol '${r}'`);
    rightToClass.set(r, k);
  }

  return {
    left: lefts,
    right: rights,
    size: lefts.length,
    leftClass: (symbol) => leftToClass.get(symbol) ?? -1,
    rightClass: (symbol) => rightToClass.get(symbol) ?? -1,
  };
}

export const DEFAULT_ALPHABET: BracketAlphabet = createBracketAlphabet(LEFT_BRACKETS, RIGHT_BRACKETS);

/**
 * Returns the counterpart of a bracket symbol: `'<'` gives `'>'`, `'z'` gives `'Z'`.
 */
export function matchingBracket(
  symbol: string,
  alphabet: BracketAlphabet = DEFAULT_ALPHABET,
): Result<string, UnrecognizedSymbolError> {
  const l = alphabet.leftClass(symbol);
  if (l >= 0) return ok(alphabet.right[l]!);
  const r = alphabet.rightClass(symbol);
  if (r >= 0) return ok(alphabet.left[r]!);
  return err(new UnrecognizedSymbolError(symbol));
}
