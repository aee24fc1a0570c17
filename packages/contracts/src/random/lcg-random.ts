/**
 * Deterministic PRNG used by level generation.
 *
 * - 64-bit linear congruential step (Knuth's MMIX multiplier)
 * - Seed is diffused with a SplitMix64 finalizer so small, adjacent seeds
 *   do not produce correlated streams
 * - Each call to `next()` yields the high 32 bits of the state
 *
 * The output stream is a pure function of the seed and the number of calls,
 * so the order in which callers draw values is part of any generator's
 * contract.
 */

const MASK_64 = 0xffffffffffffffffn;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const MIX_MULTIPLIER_1 = 0xbf58476d1ce4e5b9n;
const MIX_MULTIPLIER_2 = 0x94d049bb133111ebn;
const LCG_MULTIPLIER = 6364136223846793005n;
const LCG_INCREMENT = 1n;

/**
 * SplitMix64-style avalanche of a 32-bit seed into a 64-bit state.
 */
function mixSeed(seed: number): bigint {
  let z = (BigInt(seed >>> 0) + GOLDEN_GAMMA) & MASK_64;
  z = ((z ^ (z >> 30n)) * MIX_MULTIPLIER_1) & MASK_64;
  z = ((z ^ (z >> 27n)) * MIX_MULTIPLIER_2) & MASK_64;
  return z ^ (z >> 31n);
}

export class LcgRandom {
  private state: bigint;

  constructor(seed: number) {
    this.state = mixSeed(seed);
  }

  /**
   * Advance the state and return the next 32-bit unsigned value.
   */
  next(): number {
    this.state = (this.state * LCG_MULTIPLIER + LCG_INCREMENT) & MASK_64;
    return Number(this.state >> 32n);
  }

  /**
   * Random integer in [min, max).
   *
   * Returns `min` without advancing the stream when the range is empty
   * (`min >= max`).
   */
  range(min: number, max: number): number {
    if (min >= max) return min;
    return min + (this.next() % (max - min));
  }

  /**
   * Uniform choice from an array. An empty array yields `undefined` and
   * leaves the stream untouched.
   */
  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[this.range(0, array.length)];
  }

  /**
   * Save internal state for exact reproduction
   */
  getState(): bigint {
    return this.state;
  }

  /**
   * Restore saved state
   */
  setState(state: bigint): void {
    this.state = state & MASK_64;
  }
}
