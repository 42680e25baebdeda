import type { StructureRecord } from "../record/record.js";
import { assignBracketClasses } from "../structure/codec.js";
import { DEFAULT_ALPHABET, type BracketAlphabet } from "../structure/brackets.js";

/**
 * Metadata for a selected site, suitable for hover tooltips and UI labels.
 */
export interface SiteSelection {
  siteIndex: number;
  position: number; // 1-based
  base?: string;
  bracket?: string;
  partner?: { siteIndex: number; position: number; base?: string };
}

/**
 * Maps a site index (e.g. a picked arc or mountain vertex) to its metadata.
 * @param record record whose structure and sequence are read
 * @param siteIndex 0-based site index (0..length-1)
 * @param alphabet bracket alphabet used to name the site's bracket symbol
 * @returns SiteSelection or null if out of range
 */
export function getSiteSelection(
  record: StructureRecord,
  siteIndex: number,
  alphabet: BracketAlphabet = DEFAULT_ALPHABET,
): SiteSelection | null {
  const paired = record.paired;
  if (!Number.isInteger(siteIndex) || siteIndex < 0 || siteIndex >= paired.length) return null;

  const bases = Array.from(record.sequence);
  const base = bases[siteIndex];
  const j = paired[siteIndex]!;
  if (j === 0) return { siteIndex, position: siteIndex + 1, base };

  const partner = { siteIndex: j - 1, position: j, base: bases[j - 1] };

  let bracket: string | undefined = undefined;
  const classes = assignBracketClasses(record, { alphabet });
  if (classes.ok) {
    const k = classes.value[siteIndex]!;
    bracket = j > siteIndex + 1 ? alphabet.left[k] : alphabet.right[k];
  }

  return { siteIndex, position: siteIndex + 1, base, bracket, partner };
}

/**
 * Formats a short label for a site selection (e.g. "G12 ( · C40").
 */
export function formatSiteLabel(sel: SiteSelection): string {
  const site = `${sel.base ?? ""}${sel.position}`;
  const partner = sel.partner ? `${sel.partner.base ?? ""}${sel.partner.position}` : "unpaired";
  return [site, sel.bracket ?? "", partner].filter(Boolean).join(" · ");
}
