/**
 * Mountain metric on secondary structures, after Moulton et al.,
 * "Metrics on RNA secondary structures", J. Comput. Biol. 7 (2000) 277-292.
 *
 * A structure's mountain vector is the running count of open pairs at each
 * site; distances are taken between the mountain vectors of two structures of
 * equal length.
 */
import type { PairedSitesSource } from "../types/pairedSites.js";
import { pairedSitesOf, structureStar, structureZero } from "../types/pairedSites.js";
import { UnequalLengthError } from "../structure/errors.js";
import { err, ok, type Result } from "../utils/result.js";

/**
 * @example
 * mountainVector(unwrap(decodeDotBracket("(((...)))"))) // [1, 2, 3, 3, 3, 3, 2, 1, 0]
 */
export function mountainVector(source: PairedSitesSource): Float64Array {
  const paired = pairedSitesOf(source);
  const mountain = new Float64Array(paired.length);
  let h = 0;
  for (let i = 0; i < paired.length; i++) {
    const j = paired[i]!;
    if (j !== 0) h += j > i ? 1 : -1;
    mountain[i] = h;
  }
  return mountain;
}

/**
 * Like {@link mountainVector} but each step is scaled by 1 / span of its pair.
 * Expects a valid array (see validatePairedSites); a self-paired site has span 0.
 */
export function weightedMountainVector(source: PairedSitesSource): Float64Array {
  const paired = pairedSitesOf(source);
  const mountain = new Float64Array(paired.length);
  let h = 0;
  for (let i = 0; i < paired.length; i++) {
    const j = paired[i]!;
    if (j !== 0) h += (j > i ? 1 : -1) / Math.abs(j - 1 - i);
    mountain[i] = h;
  }
  return mountain;
}

function vectorDistance(m1: Float64Array, m2: Float64Array, p: number): number {
  let d = 0;
  for (let i = 0; i < m1.length; i++) {
    const diff = Math.abs(m1[i]! - m2[i]!);
    if (diff === 0) continue;
    d += p === 1 ? diff : Math.pow(diff, p);
  }
  return d;
}

function checkLengths(a: PairedSitesSource, b: PairedSitesSource): UnequalLengthError | null {
  const la = pairedSitesOf(a).length;
  const lb = pairedSitesOf(b).length;
  return la === lb ? null : new UnequalLengthError(la, lb);
}

// Zero diameter happens for lengths 0..2, where the reference structure has no pairs.
function normalise(distance: number, diameter: number): number {
  if (diameter === 0) return distance === 0 ? 0 : 1;
  return distance / diameter;
}

export function mountainDistance(
  a: PairedSitesSource,
  b: PairedSitesSource,
  p = 1,
): Result<number, UnequalLengthError> {
  const lengthError = checkLengths(a, b);
  if (lengthError) return err(lengthError);
  return ok(vectorDistance(mountainVector(a), mountainVector(b), p));
}

/**
 * The largest mountain distance between structures of the given length: the
 * distance between {@link structureStar} and {@link structureZero}.
 */
export function mountainDiameter(length: number, p = 1): number {
  return vectorDistance(mountainVector(structureStar(length)), mountainVector(structureZero(length)), p);
}

/**
 * Mountain distance divided by the diameter for the shared length. When the
 * diameter is zero the result is 0 for identical structures and 1 otherwise.
 */
export function normalisedMountainDistance(
  a: PairedSitesSource,
  b: PairedSitesSource,
  p = 1,
): Result<number, UnequalLengthError> {
  const d = mountainDistance(a, b, p);
  if (!d.ok) return d;
  return ok(normalise(d.value, mountainDiameter(pairedSitesOf(a).length, p)));
}

export function weightedMountainDistance(a: PairedSitesSource, b: PairedSitesSource): Result<number, UnequalLengthError> {
  const lengthError = checkLengths(a, b);
  if (lengthError) return err(lengthError);
  return ok(vectorDistance(weightedMountainVector(a), weightedMountainVector(b), 1));
}

export function weightedMountainDiameter(length: number): number {
  return vectorDistance(weightedMountainVector(structureStar(length)), weightedMountainVector(structureZero(length)), 1);
}

export function normalisedWeightedMountainDistance(
  a: PairedSitesSource,
  b: PairedSitesSource,
): Result<number, UnequalLengthError> {
  const d = weightedMountainDistance(a, b);
  if (!d.ok) return d;
  return ok(normalise(d.value, weightedMountainDiameter(pairedSitesOf(a).length)));
}
