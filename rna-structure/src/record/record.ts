import type { HasPairedSites, PairedSites, PairedSitesSource } from "../types/pairedSites.js";
import { pairedSitesEqual } from "../types/pairedSites.js";
import { decodeDotBracket, encodeDotBracket, type CodecOptions } from "../structure/codec.js";
import { isPseudoknotted } from "../structure/pseudoknot.js";
import type { ClassifierError, DecodeError, EncodeError, UnequalLengthError } from "../structure/errors.js";
import {
  mountainDistance,
  mountainVector,
  normalisedMountainDistance,
  weightedMountainDistance,
} from "../metrics/mountain.js";
import { ok, unwrap, type Result } from "../utils/result.js";

/** Base written for every site when a record is built without a sequence. */
export const PLACEHOLDER_BASE = "N";

export interface RecordInit {
  name?: string;
  sequence?: string;
}

/**
 * A named secondary structure together with its nucleotide sequence.
 *
 * Fields may be replaced at any time; nothing ties the sequence to the
 * structure beyond what callers check themselves.
 */
export class StructureRecord implements HasPairedSites {
  name: string;
  sequence: string;
  paired: PairedSites;

  private constructor(name: string, sequence: string, paired: PairedSites) {
    this.name = name;
    this.sequence = sequence;
    this.paired = paired;
  }

  static fromPaired(paired: PairedSites, init: RecordInit = {}): StructureRecord {
    const sequence = init.sequence ?? PLACEHOLDER_BASE.repeat(paired.length);
    return new StructureRecord(init.name ?? "", sequence, paired);
  }

  static fromDotBracket(text: string, init: RecordInit & CodecOptions = {}): Result<StructureRecord, DecodeError> {
    const decoded = decodeDotBracket(text, init);
    if (!decoded.ok) return decoded;
    return ok(StructureRecord.fromPaired(decoded.value, init));
  }

  rename(name: string): this {
    this.name = name;
    return this;
  }

  setSequence(sequence: string): this {
    this.sequence = sequence;
    return this;
  }

  setPaired(paired: PairedSites): this {
    this.paired = paired;
    return this;
  }

  get length(): number {
    return this.paired.length;
  }

  toDotBracket(options?: CodecOptions): Result<string, EncodeError> {
    return encodeDotBracket(this, options);
  }

  isPseudoknotted(): Result<boolean, ClassifierError> {
    return isPseudoknotted(this);
  }

  mountainVector(): Float64Array {
    return mountainVector(this);
  }

  mountainDistance(other: PairedSitesSource, p = 1): Result<number, UnequalLengthError> {
    return mountainDistance(this, other, p);
  }

  normalisedMountainDistance(other: PairedSitesSource, p = 1): Result<number, UnequalLengthError> {
    return normalisedMountainDistance(this, other, p);
  }

  weightedMountainDistance(other: PairedSitesSource): Result<number, UnequalLengthError> {
    return weightedMountainDistance(this, other);
  }

  /** Structural equality: compares paired sites only. */
  equals(other: PairedSitesSource): boolean {
    return pairedSitesEqual(this, other);
  }

  /** Three lines: `>name`, the sequence, the dot-bracket structure. */
  format(options?: CodecOptions): Result<string, EncodeError> {
    const dbn = this.toDotBracket(options);
    if (!dbn.ok) return dbn;
    return ok(`>${this.name}\n${this.sequence}\n${dbn.value}`);
  }

  /** Same text as {@link format}; throws the encode error when there is none. */
  toString(): string {
    return unwrap(this.format());
  }
}
