// ============================================
// Seeded Random Source
// ============================================

/**
 * Uniform draw in [0, 1)
 */
export type RNG = () => number;

const GOLDEN_GAMMA = 0x6d2b79f5;
const UINT32_RANGE = 2 ** 32;

/**
 * mulberry32: 32-bit state, full period, reproducible from a seed.
 */
export function mulberry32(seed: number): RNG {
  let state = seed >>> 0;

  return () => {
    state = (state + GOLDEN_GAMMA) >>> 0;
    let mixed = Math.imul(state ^ (state >>> 15), state | 1);
    mixed ^= mixed + Math.imul(mixed ^ (mixed >>> 7), mixed | 61);
    return ((mixed ^ (mixed >>> 14)) >>> 0) / UINT32_RANGE;
  };
}

/**
 * Integer in [min, max), or min when the range is empty.
 */
export function randInt(rng: RNG, min: number, max: number): number {
  if (max <= min) return min;
  return min + Math.floor(rng() * (max - min));
}

export function randItem<T>(rng: RNG, list: readonly T[]): T | undefined {
  if (list.length === 0) return undefined;
  return list[randInt(rng, 0, list.length)];
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffled<T>(rng: RNG, list: readonly T[]): T[] {
  const result = [...list];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randInt(rng, 0, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
