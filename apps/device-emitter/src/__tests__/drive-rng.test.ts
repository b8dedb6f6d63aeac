import { describe, it, expect } from '@jest/globals';
import { seededRng } from '../drive-rng.js';

describe('seededRng', () => {
  it('replays the same draws for the same seed', () => {
    const a = seededRng(42);
    const b = seededRng(42);
    const draws = (r: ReturnType<typeof seededRng>) => Array.from({ length: 5 }, () => r.between(0, 1));
    expect(draws(a)).toEqual(draws(b));
  });

  it('keeps whole draws within inclusive bounds and floats below the upper bound', () => {
    const rng = seededRng(7);
    const wholes = new Set<number>();
    for (let i = 0; i < 200; i++) {
      const n = rng.wholeBetween(3, 5);
      wholes.add(n);
      const f = rng.between(30, 100);
      expect(f).toBeGreaterThanOrEqual(30);
      expect(f).toBeLessThan(100);
    }
    expect([...wholes].sort()).toEqual([3, 4, 5]);
  });

  it('treats probability 0 as never and 1 as always', () => {
    const rng = seededRng(1);
    expect(Array.from({ length: 20 }, () => rng.chance(0)).some(Boolean)).toBe(false);
    expect(Array.from({ length: 20 }, () => rng.chance(1)).every(Boolean)).toBe(true);
  });
});
