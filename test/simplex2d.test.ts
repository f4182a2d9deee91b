import { snoise2, permute, NOISE_PERIOD } from '../src/terrain/simplex2d';

describe('snoise2', () => {
  it('should return values in approximately [-1, 1]', () => {
    let min = Infinity, max = -Infinity;

    for (let i = 0; i < 10000; i++) {
      const v = snoise2(i * 0.137 - 300, i * 0.071 + 25);
      if (v < min) min = v;
      if (v > max) max = v;
    }

    expect(min).toBeGreaterThan(-1.5);
    expect(max).toBeLessThan(1.5);
    // Should actually reach a reasonable range
    expect(max - min).toBeGreaterThan(0.5);
  });

  it('should be deterministic', () => {
    for (let i = 0; i < 100; i++) {
      const x = i * 0.37 - 12, y = i * 0.53 + 4;
      expect(snoise2(x, y)).toBe(snoise2(x, y));
    }
  });

  it('should be zero at the lattice origin', () => {
    expect(snoise2(0, 0)).toBeCloseTo(0, 12);
  });

  it('should be smooth (nearby inputs produce nearby outputs)', () => {
    const base = snoise2(12.5, -7.25);
    const nearby = snoise2(12.501, -7.249);
    expect(Math.abs(base - nearby)).toBeLessThan(0.05);
  });

  it('should vary across space', () => {
    let same = 0;
    for (let i = 1; i < 100; i++) {
      if (snoise2(i * 0.61, i * 0.29) === snoise2(i * 0.61 + 0.5, i * 0.29)) same++;
    }
    expect(same).toBeLessThan(5);
  });
});

describe('permute', () => {
  it('should repeat with period 289', () => {
    for (let k = 0; k < NOISE_PERIOD; k++) {
      expect(permute(k + NOISE_PERIOD)).toBe(permute(k));
    }
  });

  it('should stay inside [0, 289) for non-negative input', () => {
    for (let k = 0; k < NOISE_PERIOD; k++) {
      const h = permute(k);
      expect(h).toBeGreaterThanOrEqual(0);
      expect(h).toBeLessThan(NOISE_PERIOD);
    }
  });

  it('should follow (34x + 1) · x mod 289', () => {
    expect(permute(0)).toBe(0);
    expect(permute(1)).toBe(35);
    expect(permute(10)).toBe(3410 % 289);
  });
});
