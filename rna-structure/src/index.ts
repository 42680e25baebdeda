export * from "./types/pairedSites.js";
export * from "./structure/errors.js";
export {
  LEFT_BRACKETS,
  RIGHT_BRACKETS,
  DEFAULT_ALPHABET,
  createBracketAlphabet,
  matchingBracket,
  type BracketAlphabet,
} from "./structure/brackets.js";
export { decodeDotBracket, encodeDotBracket, assignBracketClasses, type CodecOptions } from "./structure/codec.js";
export { isPseudoknotted } from "./structure/pseudoknot.js";
export {
  mountainVector,
  mountainDistance,
  mountainDiameter,
  normalisedMountainDistance,
  weightedMountainVector,
  weightedMountainDistance,
  weightedMountainDiameter,
  normalisedWeightedMountainDistance,
} from "./metrics/mountain.js";
export { StructureRecord, PLACEHOLDER_BASE, type RecordInit } from "./record/record.js";
export { buildRecords, type RecordEntry, type BuildRecordsOptions, type BuildRecordsResult } from "./record/batch.js";
export { getSiteSelection, formatSiteLabel, type SiteSelection } from "./select/selection.js";
export * from "./adapters/three/index.js";
export { ok, err, unwrap, type Result } from "./utils/result.js";
export { WarningCollector } from "./utils/warnings.js";
