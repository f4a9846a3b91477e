// ============================================
// Seeded Random Source Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { mulberry32, randInt, randItem, shuffled } from '../rand';

describe('seeded random source', () => {
  it('replays the same sequence for the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const first = [a(), a(), a(), a()];
    expect([b(), b(), b(), b()]).toEqual(first);
  });

  it('stays in [0, 1)', () => {
    const rng = mulberry32(1);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  describe('randInt', () => {
    it('maps the unit interval onto [min, max)', () => {
      expect(randInt(() => 0, -1, 2)).toBe(-1);
      expect(randInt(() => 0.5, -1, 2)).toBe(0);
      expect(randInt(() => 0.999, -1, 2)).toBe(1);
    });

    it('returns min for an empty range', () => {
      expect(randInt(() => 0.7, 3, 3)).toBe(3);
      expect(randInt(() => 0.7, 0, 0)).toBe(0);
    });
  });

  describe('randItem', () => {
    it('picks by index', () => {
      expect(randItem(() => 0.6, ['a', 'b', 'c'])).toBe('b');
    });

    it('returns undefined for an empty list', () => {
      expect(randItem(() => 0.5, [])).toBeUndefined();
    });
  });

  describe('shuffled', () => {
    it('keeps every element and leaves the input untouched', () => {
      const input = [1, 2, 3, 4, 5];
      const result = shuffled(mulberry32(9), input);
      expect(input).toEqual([1, 2, 3, 4, 5]);
      expect([...result].sort()).toEqual([1, 2, 3, 4, 5]);
    });

    it('keeps the order when every draw picks the last slot', () => {
      expect(shuffled(() => 0.999, ['a', 'b', 'c'])).toEqual(['a', 'b', 'c']);
    });
  });
});
