/**
 * Fractal Brownian motion over snoise2.
 *
 * Each octave is rotated by 0.5 rad, doubled in frequency and shifted by
 * (100, 100) before sampling, so octaves do not line up along the lattice
 * axes. The sum is not normalised or clamped: with amplitudes
 * 0.5 + 0.25 + … the result stays near [-1, 1] but can overshoot slightly.
 */

import { snoise2 } from './simplex2d';

export const NUM_OCTAVES = 5;
export const FBM_INPUT_SCALE = 0.01;
export const FBM_SHIFT = 100.0;
export const FBM_ROTATION = 0.5;

const COS_R = Math.cos(FBM_ROTATION);
const SIN_R = Math.sin(FBM_ROTATION);

export function fbm(px: number, py: number): number {
  let x = px * FBM_INPUT_SCALE;
  let y = py * FBM_INPUT_SCALE;
  let v = 0.0;
  let a = 0.5;

  for (let i = 0; i < NUM_OCTAVES; i++) {
    v += a * snoise2(x, y);

    const rx = COS_R * x - SIN_R * y;
    const ry = SIN_R * x + COS_R * y;
    x = rx * 2.0 + FBM_SHIFT;
    y = ry * 2.0 + FBM_SHIFT;

    a *= 0.5;
  }

  return v;
}
