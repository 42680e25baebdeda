import * as THREE from "three";
import type { PairedSitesSource } from "../../types/pairedSites.js";
import { listBasePairs } from "../../types/pairedSites.js";
import { assignBracketClasses } from "../../structure/codec.js";
import { DEFAULT_ALPHABET, type BracketAlphabet } from "../../structure/brackets.js";
import { unwrap } from "../../utils/result.js";

/**
 * Options for building an arc diagram from base pairs.
 */
export interface ArcLineOptions {
  color?: number | string | THREE.Color;         // arcs of bracket class 0
  crossingColor?: number | string | THREE.Color; // arcs of every other class
  spacing?: number;        // x distance between consecutive sites
  heightRatio?: number;    // arc height relative to its half-width
  segmentsPerArc?: number;
  alphabet?: BracketAlphabet;
}

/**
 * Create a THREE.LineSegments arc diagram: one half-ellipse per base pair.
 *
 * - Class 0 pairs arc above the backbone (y > 0), pairs of higher classes
 *   (the ones crossing a class 0 pair) arc below it
 * - Colors are per-vertex so both sides share one material
 *
 * Throws the structure's encode error when it cannot be assigned bracket classes.
 *
 * @param source paired sites or a record
 * @param opts Optional rendering parameters
 * @returns LineSegments or undefined if the structure has no pairs
 */
export function makeArcLines(source: PairedSitesSource, opts: ArcLineOptions = {}): THREE.LineSegments | undefined {
  const {
    color = 0x4f9dff,
    crossingColor = 0xff7a45,
    spacing = 1,
    heightRatio = 1,
    segmentsPerArc = 16,
    alphabet = DEFAULT_ALPHABET,
  } = opts;

  const pairs = listBasePairs(source);
  if (pairs.length === 0) return undefined;
  const classes = unwrap(assignBracketClasses(source, { alphabet }));

  const segs = Math.max(1, Math.floor(segmentsPerArc));
  const vertsPerArc = segs * 2;
  const posArr = new Float32Array(pairs.length * vertsPerArc * 3);
  const colArr = new Float32Array(pairs.length * vertsPerArc * 3);
  const nested = new THREE.Color(color);
  const crossing = new THREE.Color(crossingColor);

  let w = 0;
  for (const [i, j] of pairs) {
    const side = classes[i] === 0 ? 1 : -1;
    const c = side > 0 ? nested : crossing;
    const rx = ((j - i) * spacing) / 2;
    const cx = i * spacing + rx;
    const ry = rx * heightRatio * side;
    for (let s = 0; s < segs; s++) {
      for (const t of [s, s + 1]) {
        const theta = (Math.PI * t) / segs;
        posArr[w] = cx - rx * Math.cos(theta);
        posArr[w + 1] = ry * Math.sin(theta);
        posArr[w + 2] = 0;
        colArr[w] = c.r; colArr[w + 1] = c.g; colArr[w + 2] = c.b;
        w += 3;
      }
    }
  }

  const geom = new THREE.BufferGeometry();
  geom.setAttribute("position", new THREE.BufferAttribute(posArr, 3));
  geom.setAttribute("color", new THREE.BufferAttribute(colArr, 3));
  geom.computeBoundingSphere();

  const material = new THREE.LineBasicMaterial({ vertexColors: true });
  return new THREE.LineSegments(geom, material);
}
