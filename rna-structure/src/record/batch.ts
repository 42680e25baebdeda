import type { PairedSites } from "../types/pairedSites.js";
import { validatePairedSites } from "../types/pairedSites.js";
import type { CodecOptions } from "../structure/codec.js";
import { StructureRecord } from "./record.js";
import { WarningCollector } from "../utils/warnings.js";

export interface RecordEntry {
  name: string;
  sequence?: string;
  // dot-bracket text or a paired-sites array
  structure: string | PairedSites;
}

export interface BuildRecordsOptions extends CodecOptions {
  // What to do when a sequence does not match the structure length:
  // 'reject' (default) => skip the entry; 'placeholder' => keep it with a placeholder sequence
  sequencePolicy?: "reject" | "placeholder";
  // Upper bound on collected warnings
  maxWarnings?: number;
}

export interface BuildRecordsResult {
  records: StructureRecord[];
  warnings: string[];
}

/**
 * Builds records from a list of entries, skipping the ones that fail and
 * reporting each failure as a warning instead of aborting the batch.
 */
export function buildRecords(entries: Iterable<RecordEntry>, options: BuildRecordsOptions = {}): BuildRecordsResult {
  const { sequencePolicy = "reject", maxWarnings } = options;
  const W = new WarningCollector(maxWarnings);
  const records: StructureRecord[] = [];

  let index = 0;
  for (const entry of entries) {
    index++;
    const label = entry.name ? `Record ${index} (${entry.name})` : `Record ${index}`;

    let record: StructureRecord;
    if (typeof entry.structure === "string") {
      const parsed = StructureRecord.fromDotBracket(entry.structure, { ...options, name: entry.name });
      if (!parsed.ok) { W.add(`${label}: ${parsed.error.message}`); continue; }
      record = parsed.value;
    } else {
      const valid = validatePairedSites(entry.structure);
      if (!valid.ok) { W.add(`${label}: ${valid.error.message}`); continue; }
      record = StructureRecord.fromPaired(valid.value, { name: entry.name });
    }

    if (entry.sequence != null) {
      const seqLength = Array.from(entry.sequence).length;
      if (seqLength === record.length) {
        record.setSequence(entry.sequence);
      } else if (sequencePolicy === "placeholder") {
        // record already carries the placeholder sequence
        W.add(`${label}: sequence length ${seqLength} does not match structure length ${record.length}, using placeholder`);
      } else {
        W.add(`${label}: sequence length ${seqLength} does not match structure length ${record.length}, skipped`);
        continue;
      }
    }
    records.push(record);
  }

  return { records, warnings: W.toArray() };
}
