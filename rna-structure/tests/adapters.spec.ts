import { describe, it, expect } from "vitest";
import * as THREE from "three";

import {
  decodeDotBracket,
  makeArcLines,
  makeMountainLine,
  makeStructureObjects,
  unwrap,
  InvalidPairedSitesError,
} from "../src/index.js";

const pk = unwrap(decodeDotBracket("<((..)..).A>..a"));

describe("three.js adapters", () => {
  it("builds a mountain polyline", () => {
    const line = makeMountainLine(unwrap(decodeDotBracket("(((...)))")));
    expect(line).toBeInstanceOf(THREE.Line);
    const pos = line?.geometry.getAttribute("position");
    expect(pos?.count).toBe(9);
    expect(pos?.getY(2)).toBe(3);
    expect(pos?.getY(8)).toBe(0);
  });

  it("applies spacing and scale to the mountain polyline", () => {
    const line = makeMountainLine(unwrap(decodeDotBracket("(((...)))")), { spacing: 0.5, scale: 2 });
    const pos = line?.geometry.getAttribute("position");
    expect(pos?.getX(4)).toBe(2);
    expect(pos?.getY(4)).toBe(6);
  });

  it("skips empty structures", () => {
    expect(makeMountainLine([])).toBeUndefined();
    expect(makeArcLines([0, 0, 0])).toBeUndefined();
  });

  it("draws one arc per pair, crossing classes below the backbone", () => {
    const arcs = makeArcLines(pk, { segmentsPerArc: 4 });
    expect(arcs).toBeInstanceOf(THREE.LineSegments);
    const pos = arcs?.geometry.getAttribute("position");
    // 4 pairs * 4 segments * 2 vertices
    expect(pos?.count).toBe(32);
    // first arc spans sites 0..11: second vertex sits at 45 degrees
    expect(pos?.getY(1)).toBeCloseTo(5.5 * Math.SQRT1_2, 4);
    // apex of the class 1 arc spanning sites 10..14
    expect(pos?.getX(27)).toBeCloseTo(12, 4);
    expect(pos?.getY(27)).toBeCloseTo(-2, 4);
    expect(arcs?.geometry.getAttribute("color")?.count).toBe(32);
  });

  it("throws the encode error for an invalid structure", () => {
    expect(() => makeArcLines([2, 0])).toThrow(InvalidPairedSitesError);
  });

  it("composes the builders", () => {
    const objs = makeStructureObjects(pk, { arcs: false });
    expect(objs.mountain).toBeInstanceOf(THREE.Line);
    expect(objs.arcs).toBeUndefined();

    const both = makeStructureObjects({ paired: pk });
    expect(both.arcs).toBeInstanceOf(THREE.LineSegments);
  });
});
