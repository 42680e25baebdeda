import { InvalidPairedSitesError } from "../structure/errors.js";
import { err, ok, type Result } from "../utils/result.js";

/**
 * Canonical structure representation: entry i holds the 1-based position of
 * the partner of site i, or 0 when site i is unpaired.
 */
export type PairedSites = readonly number[];

/** Anything that can hand out a paired-sites view of itself. */
export interface HasPairedSites {
  readonly paired: PairedSites;
}

export type PairedSitesSource = PairedSites | HasPairedSites;

export function pairedSitesOf(source: PairedSitesSource): PairedSites {
  return isHasPairedSites(source) ? source.paired : source;
}

function isHasPairedSites(source: PairedSitesSource): source is HasPairedSites {
  return !Array.isArray(source);
}

/**
 * Checks the pairing invariant: every entry is an integer in 0..N, no site
 * pairs with itself, and every pair is mutual.
 */
export function validatePairedSites(source: PairedSitesSource): Result<PairedSites, InvalidPairedSitesError> {
  const paired = pairedSitesOf(source);
  const n = paired.length;
  for (let i = 0; i < n; i++) {
    const j = paired[i]!;
    if (!Number.isInteger(j) || j < 0 || j > n) {
      return err(new InvalidPairedSitesError(i + 1, j, `partner out of range 0..${n}`));
    }
    if (j === 0) continue;
    if (j === i + 1) return err(new InvalidPairedSitesError(i + 1, j, "site paired with itself"));
    if (paired[j - 1] !== i + 1) {
      return err(new InvalidPairedSitesError(i + 1, j, `partner site ${j} does not pair back`));
    }
  }
  return ok(paired);
}

/** Base pairs as 0-based `[i, j]` with `i < j`, ordered by `i`. */
export function listBasePairs(source: PairedSitesSource): Array<[number, number]> {
  const paired = pairedSitesOf(source);
  const out: Array<[number, number]> = [];
  for (let i = 0; i < paired.length; i++) {
    const j = paired[i]! - 1;
    if (j > i) out.push([i, j]);
  }
  return out;
}

export function pairedSitesEqual(a: PairedSitesSource, b: PairedSitesSource): boolean {
  const pa = pairedSitesOf(a);
  const pb = pairedSitesOf(b);
  if (pa.length !== pb.length) return false;
  for (let i = 0; i < pa.length; i++) if (pa[i] !== pb[i]) return false;
  return true;
}

/**
 * The structure of the given length with the maximal number of nested pairs:
 * site i pairs with site L-1-i, leaving one unpaired site in the middle for odd
 * lengths and two for even lengths. Negative lengths count as 0 and
 * fractional ones are rounded down.
 */
export function structureStar(length: number): number[] {
  const n = Math.max(0, Math.floor(length));
  const paired = new Array<number>(n).fill(0);
  const upper = Math.floor(n / 2) - ((n + 1) % 2);
  for (let i = 0; i < upper; i++) {
    const j = n - i - 1;
    paired[i] = j + 1;
    paired[j] = i + 1;
  }
  return paired;
}

/** The fully unpaired structure of the given length, clamped like {@link structureStar}. */
export function structureZero(length: number): number[] {
  return new Array<number>(Math.max(0, Math.floor(length))).fill(0);
}
