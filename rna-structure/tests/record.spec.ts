import { describe, it, expect } from "vitest";

import {
  StructureRecord,
  buildRecords,
  decodeDotBracket,
  mountainDistance,
  unwrap,
  InvalidPairedSitesError,
  UnmatchedClosingBracketError,
} from "../src/index.js";

describe("StructureRecord", () => {
  it("fills a placeholder sequence when built from brackets alone", () => {
    const record = unwrap(StructureRecord.fromDotBracket("(((..))..).."));
    expect(record.name).toBe("");
    expect(record.sequence).toBe("NNNNNNNNNNNN");
    expect(record.paired).toEqual([10, 7, 6, 0, 0, 3, 2, 0, 0, 1, 0, 0]);
    expect(record.length).toBe(12);
  });

  it("formats name, sequence and structure on three lines", () => {
    const record = unwrap(StructureRecord.fromDotBracket("((..))", { name: "hairpin", sequence: "GGAACC" }));
    expect(unwrap(record.format())).toBe(">hairpin\nGGAACC\n((..))");
    expect(String(record)).toBe(">hairpin\nGGAACC\n((..))");
  });

  it("formats crossing pairs with canonical classes", () => {
    const record = unwrap(StructureRecord.fromDotBracket("<((..)..).A>..a", { name: "pk" }));
    expect(record.toString()).toBe(">pk\nNNNNNNNNNNNNNNN\n(((..)..).<)..>");
  });

  it("surfaces decode errors unchanged", () => {
    const res = StructureRecord.fromDotBracket("..)");
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(UnmatchedClosingBracketError);
      expect(res.error.position).toBe(3);
    }
  });

  it("throws the encode error when displayed with an invalid structure", () => {
    const record = StructureRecord.fromPaired([2, 0]);
    expect(record.format().ok).toBe(false);
    expect(() => record.toString()).toThrow(InvalidPairedSitesError);
  });

  it("replaces fields independently", () => {
    const record = StructureRecord.fromPaired([3, 0, 1])
      .rename("tRNA fragment")
      .setSequence("GAC");
    expect(unwrap(record.format())).toBe(">tRNA fragment\nGAC\n(.)");

    record.setPaired([0, 0, 0]).setSequence("G");
    expect(record.sequence).toBe("G");
    expect(unwrap(record.toDotBracket())).toBe("...");
  });

  it("delegates classification and metrics", () => {
    const pk = unwrap(StructureRecord.fromDotBracket("(<)>"));
    const nested = unwrap(StructureRecord.fromDotBracket("(())"));
    expect(unwrap(pk.isPseudoknotted())).toBe(true);
    expect(unwrap(nested.isPseudoknotted())).toBe(false);
    expect(Array.from(nested.mountainVector())).toEqual([1, 2, 1, 0]);
    expect(unwrap(nested.mountainDistance(pk))).toBe(unwrap(mountainDistance(nested.paired, pk.paired)));
    // crossing is invisible to the mountain metric: both climb to 2 at site 1
    expect(unwrap(nested.mountainDistance(pk))).toBe(0);
    expect(unwrap(nested.mountainDistance(unwrap(decodeDotBracket("(..)"))))).toBe(1);
    expect(unwrap(nested.normalisedMountainDistance(nested))).toBe(0);
    expect(unwrap(nested.weightedMountainDistance(nested))).toBe(0);
    expect(nested.mountainDistance([0]).ok).toBe(false);
  });

  it("compares by paired sites only", () => {
    const a = unwrap(StructureRecord.fromDotBracket("(..)", { name: "a", sequence: "GAAC" }));
    const b = unwrap(StructureRecord.fromDotBracket("<..>", { name: "b" }));
    expect(a.equals(b)).toBe(true);
    expect(a.equals(unwrap(decodeDotBracket("....")))).toBe(false);
    expect(a.equals([4, 0, 0])).toBe(false);
  });
});

describe("buildRecords", () => {
  const entries = [
    { name: "a", structure: "((..))", sequence: "GGAACC" },
    { name: "b", structure: ")(" },
    { name: "c", structure: [2, 1, 0], sequence: "GCA" },
    { name: "d", structure: "(..)", sequence: "GC" },
    { name: "e", structure: [2, 0] },
  ];

  it("skips failing entries and reports each one", () => {
    const { records, warnings } = buildRecords(entries);
    expect(records.map((r) => r.name)).toEqual(["a", "c"]);
    expect(records[0]?.sequence).toBe("GGAACC");
    expect(records[1]?.paired).toEqual([2, 1, 0]);
    expect(warnings).toEqual([
      "Record 2 (b): Unmatched closing bracket ')' (class 0) at position 1",
      "Record 4 (d): sequence length 2 does not match structure length 4, skipped",
      "Record 5 (e): Invalid paired site at position 1 (partner 2): partner site 2 does not pair back",
    ]);
  });

  it("keeps mismatched sequences as placeholders when asked", () => {
    const { records, warnings } = buildRecords(entries, { sequencePolicy: "placeholder" });
    expect(records.map((r) => r.name)).toEqual(["a", "c", "d"]);
    expect(records[2]?.sequence).toBe("NNNN");
    expect(warnings[1]).toBe("Record 4 (d): sequence length 2 does not match structure length 4, using placeholder");
  });

  it("bounds the number of warnings", () => {
    const { warnings } = buildRecords(entries, { maxWarnings: 1 });
    expect(warnings).toEqual(["Record 2 (b): Unmatched closing bracket ')' (class 0) at position 1"]);
  });

  it("passes codec options through", () => {
    const { records, warnings } = buildRecords([{ name: "wuss", structure: "(,,)" }], { unpaired: ".," });
    expect(warnings).toEqual([]);
    expect(records[0]?.paired).toEqual([4, 0, 0, 1]);
  });
});
