import { fbm, NUM_OCTAVES, FBM_INPUT_SCALE } from '../src/terrain/fbm';
import { snoise2 } from '../src/terrain/simplex2d';

/** Mulberry32 sample points for range checks. */
function samplePoints(seed: number, count: number, spread: number): Array<[number, number]> {
  let state = seed >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const points: Array<[number, number]> = [];
  for (let i = 0; i < count; i++) {
    points.push([(next() * 2 - 1) * spread, (next() * 2 - 1) * spread]);
  }
  return points;
}

describe('fbm', () => {
  it('should use five octaves', () => {
    expect(NUM_OCTAVES).toBe(5);
    expect(FBM_INPUT_SCALE).toBe(0.01);
  });

  it('should be deterministic', () => {
    for (const [x, y] of samplePoints(7, 200, 5000)) {
      expect(fbm(x, y)).toBe(fbm(x, y));
    }
  });

  it('should stay within [-1.5, 1.5] across 10,000 random points', () => {
    let min = Infinity, max = -Infinity;

    for (const [x, y] of samplePoints(42, 10000, 20000)) {
      const v = fbm(x, y);
      if (v < min) min = v;
      if (v > max) max = v;
    }

    expect(min).toBeGreaterThanOrEqual(-1.5);
    expect(max).toBeLessThanOrEqual(1.5);
    expect(max - min).toBeGreaterThan(0.3);
  });

  it('should start from half-amplitude noise at the scaled input', () => {
    // The first octave dominates; later octaves add at most 0.5 in total
    const x = 1234, y = -987;
    const firstOctave = 0.5 * snoise2(x * FBM_INPUT_SCALE, y * FBM_INPUT_SCALE);
    expect(Math.abs(fbm(x, y) - firstOctave)).toBeLessThanOrEqual(0.5 * 1.5);
  });

  it('should change slowly between neighbouring lattice points', () => {
    for (let i = 0; i < 50; i++) {
      expect(Math.abs(fbm(i, 10) - fbm(i + 1, 10))).toBeLessThan(0.2);
    }
  });
});
