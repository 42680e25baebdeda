import type { PairedSitesSource } from "../types/pairedSites.js";
import { pairedSitesOf } from "../types/pairedSites.js";
import { DEFAULT_ALPHABET, type BracketAlphabet } from "./brackets.js";
import {
  InsufficientBracketClassesError,
  InvalidPairedSitesError,
  UnmatchedClosingBracketError,
  UnmatchedOpeningBracketError,
  UnrecognizedSymbolError,
  type DecodeError,
  type EncodeError,
} from "./errors.js";
import { err, ok, type Result } from "../utils/result.js";

export interface CodecOptions {
  // Bracket classes available to both directions; defaults to the 30-class reference alphabet.
  alphabet?: BracketAlphabet;
  // Decoding accepts any of these as an unpaired site; encoding writes the first one.
  // WUSS input from alignments needs e.g. ".,:_-~".
  unpaired?: string;
}

/**
 * Parses extended dot-bracket text into a paired-sites array.
 *
 * Each bracket class keeps its own stack of pending left positions, so pairs of
 * different classes may cross. Positions reported in errors are 1-based.
 *
 * @example
 * decodeDotBracket("(((..))..)..") // ok: [10, 7, 6, 0, 0, 3, 2, 0, 0, 1, 0, 0]
 */
export function decodeDotBracket(text: string, options: CodecOptions = {}): Result<number[], DecodeError> {
  const { alphabet = DEFAULT_ALPHABET, unpaired = "." } = options;
  const unpairedSymbols = new Set(Array.from(unpaired));
  const symbols = Array.from(text);
  const paired = new Array<number>(symbols.length).fill(0);
  const stacks: number[][] = Array.from({ length: alphabet.size }, () => []);

  for (let i = 0; i < symbols.length; i++) {
    const c = symbols[i]!;
    const l = alphabet.leftClass(c);
    if (l >= 0) {
      stacks[l]!.push(i);
      continue;
    }
    const r = alphabet.rightClass(c);
    if (r >= 0) {
      const j = stacks[r]!.pop();
      if (j === undefined) return err(new UnmatchedClosingBracketError(r, c, i + 1));
      paired[i] = j + 1;
      paired[j] = i + 1;
      continue;
    }
    if (!unpairedSymbols.has(c)) return err(new UnrecognizedSymbolError(c, i + 1));
  }

  for (let k = 0; k < stacks.length; k++) {
    const stack = stacks[k]!;
    if (stack.length === 0) continue;
    const j = stack[stack.length - 1]!;
    return err(new UnmatchedOpeningBracketError(k, alphabet.left[k]!, j + 1, alphabet.right[k]!));
  }
  return ok(paired);
}

/**
 * Assigns a bracket class to every paired site (-1 for unpaired sites).
 *
 * Greedy first-fit: a pair opening at i with partner j takes the lowest class
 * whose innermost open pair closes after j, or that has no open pair. A closing
 * site reuses the class of the site it closes.
 */
export function assignBracketClasses(
  source: PairedSitesSource,
  options: Pick<CodecOptions, "alphabet"> = {},
): Result<Int16Array, EncodeError> {
  const { alphabet = DEFAULT_ALPHABET } = options;
  const paired = pairedSitesOf(source);
  const n = paired.length;
  const classes = new Int16Array(n).fill(-1);
  // per class: 1-based closing positions of the pairs still open, innermost last
  const stacks: number[][] = Array.from({ length: alphabet.size }, () => []);

  for (let i = 0; i < n; i++) {
    const j = paired[i]!;
    if (j === 0) continue;
    if (!Number.isInteger(j) || j < 0 || j > n) {
      return err(new InvalidPairedSitesError(i + 1, j, `partner out of range 0..${n}`));
    }
    if (j === i + 1) return err(new InvalidPairedSitesError(i + 1, j, "site paired with itself"));

    if (j > i + 1) {
      if (paired[j - 1] !== i + 1) {
        return err(new InvalidPairedSitesError(i + 1, j, `partner site ${j} does not pair back`));
      }
      let k = 0;
      for (; k < stacks.length; k++) {
        const stack = stacks[k]!;
        if (stack.length === 0 || stack[stack.length - 1]! > j) break;
      }
      if (k === stacks.length) return err(new InsufficientBracketClassesError(i + 1, alphabet.size));
      stacks[k]!.push(j);
      classes[i] = k;
    } else {
      const k = classes[j - 1]!;
      if (k < 0 || paired[j - 1] !== i + 1) {
        return err(new InvalidPairedSitesError(i + 1, j, `partner site ${j} was not opened`));
      }
      stacks[k]!.pop();
      classes[i] = k;
    }
  }
  return ok(classes);
}

/**
 * Renders a paired-sites array as extended dot-bracket text.
 *
 * @example
 * encodeDotBracket([5, 7, 6, 9, 1, 3, 2, 10, 4, 8, 0, 0]) // ok: "(<<{)>>(}).."
 */
export function encodeDotBracket(source: PairedSitesSource, options: CodecOptions = {}): Result<string, EncodeError> {
  const { alphabet = DEFAULT_ALPHABET, unpaired = "." } = options;
  const assigned = assignBracketClasses(source, { alphabet });
  if (!assigned.ok) return assigned;

  const paired = pairedSitesOf(source);
  const classes = assigned.value;
  const dot = Array.from(unpaired)[0] ?? ".";
  let out = "";
  for (let i = 0; i < paired.length; i++) {
    const k = classes[i]!;
    if (k < 0) out += dot;
    else if (paired[i]! > i + 1) out += alphabet.left[k]!;
    else out += alphabet.right[k]!;
  }
  return ok(out);
}
