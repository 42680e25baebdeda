/**
 * Error taxonomy for structure parsing, encoding, classification and metrics.
 *
 * Every error carries a literal `kind` so a union of them narrows on
 * `error.kind`. Positions are 1-based, matching the paired-sites encoding.
 */
export abstract class StructureError extends Error {
  abstract readonly kind: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A right bracket was read while no left bracket of its class was pending. */
export class UnmatchedClosingBracketError extends StructureError {
  readonly kind = "UnmatchedClosingBracket" as const;

  constructor(
    readonly bracketClass: number,
    readonly symbol: string,
    readonly position: number,
  ) {
    super(`Unmatched closing bracket '${symbol}' (class ${bracketClass}) at position ${position}`);
  }
}

/** Input ended while a left bracket was still waiting for its partner. */
export class UnmatchedOpeningBracketError extends StructureError {
  readonly kind = "UnmatchedOpeningBracket" as const;

  constructor(
    readonly bracketClass: number,
    readonly symbol: string,
    readonly position: number,
    readonly expected: string,
  ) {
    super(`Missing closing bracket '${expected}' for '${symbol}' (class ${bracketClass}) at position ${position}`);
  }
}

export class UnrecognizedSymbolError extends StructureError {
  readonly kind = "UnrecognizedSymbol" as const;

  constructor(
    readonly symbol: string,
    readonly position?: number,
  ) {
    super(
      position == null
        ? `Bracket symbol not recognised: '${symbol}'`
        : `Symbol not recognised: '${symbol}' at position ${position}`,
    );
  }
}

export class InsufficientBracketClassesError extends StructureError {
  readonly kind = "InsufficientBracketClasses" as const;

  constructor(
    readonly position: number,
    readonly classesAvailable: number,
  ) {
    super(`Insufficient bracket classes (${classesAvailable}) to encode the pair opening at position ${position}`);
  }
}

/** The paired-sites array is not a symmetric pairing of in-range sites. */
export class InvalidPairedSitesError extends StructureError {
  readonly kind = "InvalidPairedSites" as const;

  constructor(
    readonly position: number,
    readonly partner: number,
    readonly reason: string,
  ) {
    super(`Invalid paired site at position ${position} (partner ${partner}): ${reason}`);
  }
}

export class PrematureClosureError extends StructureError {
  readonly kind = "PrematureClosure" as const;

  constructor(readonly position: number) {
    super(`All paired sites to the left have already been consumed (position ${position})`);
  }
}

export class UnconsumedOpeningsError extends StructureError {
  readonly kind = "UnconsumedOpenings" as const;

  constructor(readonly remaining: number) {
    super(`${remaining} paired site(s) to the left have not been consumed`);
  }
}

export class UnequalLengthError extends StructureError {
  readonly kind = "UnequalLength" as const;

  constructor(
    readonly leftLength: number,
    readonly rightLength: number,
  ) {
    super(`Secondary structures must be the same length (${leftLength} != ${rightLength})`);
  }
}

export type DecodeError = UnmatchedClosingBracketError | UnmatchedOpeningBracketError | UnrecognizedSymbolError;
export type EncodeError = InsufficientBracketClassesError | InvalidPairedSitesError;
export type ClassifierError = PrematureClosureError | UnconsumedOpeningsError;
