export { makeMountainLine, type MountainLineOptions } from "./mountain.js";
export { makeArcLines, type ArcLineOptions } from "./arcs.js";

import type { PairedSitesSource } from "../../types/pairedSites.js";
import type { MountainLineOptions } from "./mountain.js";
import type { ArcLineOptions } from "./arcs.js";
import { makeMountainLine } from "./mountain.js";
import { makeArcLines } from "./arcs.js";
import * as THREE from "three";

export interface StructureObjectsOptions {
  mountain?: MountainLineOptions | false;
  arcs?: ArcLineOptions | false;
}

export interface StructureObjects {
  mountain?: THREE.Line;
  arcs?: THREE.LineSegments;
}

// Small convenience that composes individual builders without hiding behavior.
export function makeStructureObjects(source: PairedSitesSource, opts: StructureObjectsOptions = {}): StructureObjects {
  const out: StructureObjects = {};
  if (opts.mountain !== false) out.mountain = makeMountainLine(source, opts.mountain || {});
  if (opts.arcs !== false) out.arcs = makeArcLines(source, opts.arcs || {});
  return out;
}
