/**
 * 2D simplex noise with a closed-form hash and no permutation table.
 *
 * Gradient noise on the skewed triangle lattice. Corner hashes come from the
 * polynomial permute(x) = ((34x + 1) · x) mod 289, applied twice, so the
 * field repeats every 289 lattice units and needs no seed or lookup table.
 * Gradients are spread over a circle from fract(hash / 41) and each corner
 * contributes with a (0.5 − d²)⁴ falloff.
 *
 * `mod` is the truncated remainder (same as `%` on the compute device), not
 * floor-mod; negative lattice coordinates hash to their own values.
 */

// ── Lattice constants ───────────────────────────────────────────────

/** (3 − √3) / 6 */
const G2 = 0.211324865405187;
/** (√3 − 1) / 2 */
const F2 = 0.366025403784439;
/** −1 + 2·G2 */
const G2_FAR = -0.577350269189626;
/** 1 / 41 */
const INV_41 = 0.024390243902439;

export const NOISE_PERIOD = 289.0;

// ── Helpers ─────────────────────────────────────────────────────────

export function permute(x: number): number {
  return ((x * 34.0 + 1.0) * x) % NOISE_PERIOD;
}

function fract(x: number): number {
  return x - Math.floor(x);
}

/** Falloff weight times gradient dot offset for one simplex corner. */
function corner(hash: number, dx: number, dy: number): number {
  let m = Math.max(0.5 - (dx * dx + dy * dy), 0.0);
  m *= m;
  m *= m;

  const gx = 2.0 * fract(hash * INV_41) - 1.0;
  const h = Math.abs(gx) - 0.5;
  const a0 = gx - Math.floor(gx + 0.5);

  // Normalise gradients implicitly by scaling m
  m *= 1.79284291400159 - 0.85373472095314 * (a0 * a0 + h * h);

  return m * (a0 * dx + h * dy);
}

// ── Noise ───────────────────────────────────────────────────────────

/**
 * Evaluate 2D simplex noise at (x, y).
 * Returns a value in approximately [-1, 1].
 */
export function snoise2(x: number, y: number): number {
  // First corner
  const s = (x + y) * F2;
  let i = Math.floor(x + s);
  let j = Math.floor(y + s);
  const t = (i + j) * G2;
  const x0 = x - i + t;
  const y0 = y - j + t;

  // Lower or upper triangle of the skewed cell
  const i1 = x0 > y0 ? 1 : 0;
  const j1 = x0 > y0 ? 0 : 1;

  // Middle and far corners
  const x1 = x0 + G2 - i1;
  const y1 = y0 + G2 - j1;
  const x2 = x0 + G2_FAR;
  const y2 = y0 + G2_FAR;

  i %= NOISE_PERIOD;
  j %= NOISE_PERIOD;

  const h0 = permute(permute(j) + i);
  const h1 = permute(permute(j + j1) + i + i1);
  const h2 = permute(permute(j + 1.0) + i + 1.0);

  return 130.0 * (corner(h0, x0, y0) + corner(h1, x1, y1) + corner(h2, x2, y2));
}
