import * as THREE from "three";
import type { PairedSitesSource } from "../../types/pairedSites.js";
import { pairedSitesOf } from "../../types/pairedSites.js";
import { mountainVector, weightedMountainVector } from "../../metrics/mountain.js";

/**
 * Options for building a mountain plot polyline.
 */
export interface MountainLineOptions {
  color?: number | string | THREE.Color;
  spacing?: number; // x distance between consecutive sites
  scale?: number;   // y distance per unit of mountain height
  weighted?: boolean; // plot the span-weighted mountain vector instead
}

/**
 * Create a THREE.Line tracing the mountain vector of a structure.
 *
 * - Site i is placed at (i * spacing, height[i] * scale, 0)
 *
 * @param source paired sites or a record
 * @param opts Optional rendering parameters
 * @returns Line or undefined for an empty structure
 */
export function makeMountainLine(source: PairedSitesSource, opts: MountainLineOptions = {}): THREE.Line | undefined {
  const n = pairedSitesOf(source).length;
  if (n === 0) return undefined;

  const { color = 0xffffff, spacing = 1, scale = 1, weighted = false } = opts;
  const heights = weighted ? weightedMountainVector(source) : mountainVector(source);

  const posArr = new Float32Array(n * 3);
  for (let i = 0; i < n; i++) {
    posArr[i * 3] = i * spacing;
    posArr[i * 3 + 1] = heights[i]! * scale;
  }

  const geom = new THREE.BufferGeometry();
  geom.setAttribute("position", new THREE.BufferAttribute(posArr, 3));
  geom.computeBoundingSphere();

  const material = new THREE.LineBasicMaterial({ color: new THREE.Color(color) });
  return new THREE.Line(geom, material);
}
