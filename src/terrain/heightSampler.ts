/**
 * Turns fbm into terrain surface points and vertices.
 *
 * The lattice position p = (x, y) maps to world (x, height, y): the lattice
 * y axis runs along world z.
 */

import { vec3 } from 'gl-matrix';
import { fbm } from './fbm';
import type { Vec2, Vertex } from '../compute/layout';

/** Offset used for the finite-difference normal. */
export const NORMAL_SAMPLE_OFFSET = 0.1;

/** Unclamped linear interpolation; `t` outside [0, 1] extrapolates. */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

export function terrainPoint(px: number, py: number, minMaxHeight: Vec2): vec3 {
  return vec3.fromValues(px, lerp(minMaxHeight[0], minMaxHeight[1], fbm(px, py)), py);
}

/**
 * Surface vertex at lattice position (px, py).
 *
 * The normal averages two normalised cross products, one from the +x/+z
 * neighbours and one from the −x/−z neighbours. The average itself is not
 * re-normalised, so on curved ground it can be slightly shorter than 1.
 */
export function terrainVertex(px: number, py: number, minMaxHeight: Vec2): Vertex {
  const d = NORMAL_SAMPLE_OFFSET;
  const v = terrainPoint(px, py, minMaxHeight);

  const tpx = vec3.sub(vec3.create(), terrainPoint(px + d, py, minMaxHeight), v);
  const tpz = vec3.sub(vec3.create(), terrainPoint(px, py + d, minMaxHeight), v);
  const tnx = vec3.sub(vec3.create(), terrainPoint(px - d, py, minMaxHeight), v);
  const tnz = vec3.sub(vec3.create(), terrainPoint(px, py - d, minMaxHeight), v);

  const pn = vec3.normalize(vec3.create(), vec3.cross(vec3.create(), tpz, tpx));
  const nn = vec3.normalize(vec3.create(), vec3.cross(vec3.create(), tnz, tnx));

  const n = vec3.scale(vec3.create(), vec3.add(vec3.create(), pn, nn), 0.5);

  return {
    position: [v[0], v[1], v[2]],
    normal: [n[0], n[1], n[2]],
  };
}
