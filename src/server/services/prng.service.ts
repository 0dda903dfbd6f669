/**
 * PRNG Service - seedable random source for symbol, color and template selection
 *
 * Uses SplitMix64 to expand a 64-bit seed into two state words and
 * Xoroshiro128+ to generate from them. Selection code never touches
 * Math.random(): it receives a RandomSource, so tests and replayed batches
 * see the same draws for the same seed.
 *
 * References:
 * - SplitMix64: https://prng.di.unimi.it/splitmix64.c
 * - Xoroshiro128+: https://prng.di.unimi.it/xoroshiro128plus.c
 *
 * @example
 * ```typescript
 * const rng = PRNG.fromHex(hashService.deriveSeed('batch-seed', 'qwen3:1.7b|0|brain_wisdom'));
 * const symbol = pickOne(rng, ['∞', '✧', '◊']);
 * ```
 */

const UINT64_MAX = 0xffffffffffffffffn;
const UINT32_RANGE = 0x100000000;
const SPLITMIX64_MUL_1 = 0xbf58476d1ce4e5b9n;
const SPLITMIX64_MUL_2 = 0x94d049bb133111ebn;
const ROTL_A = 24n;
const ROTL_B = 37n;
const SHIFT_B = 16n;
const SEED_HEX_CHARS = 16;

/**
 * Source of uniformly distributed floats in [0, 1).
 * Anything implementing this can drive selection; tests pass fixed sources.
 */
export interface RandomSource {
  nextFloat(): number;
}

/**
 * Uniformly picks one element.
 *
 * @throws {Error} If items is empty
 */
export function pickOne<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot choose from empty array');
  }
  // Clamp guards sources that return exactly 1
  const index = Math.min(
    Math.floor(rng.nextFloat() * items.length),
    items.length - 1
  );
  return items[index];
}

export class PRNG implements RandomSource {
  private state0: bigint;
  private state1: bigint;

  /**
   * @param seed - 64-bit seed; the same seed always yields the same sequence
   * @throws {Error} If seed is not a BigInt
   */
  constructor(seed: bigint) {
    if (typeof seed !== 'bigint') {
      throw new Error('seed must be a BigInt');
    }

    const first = PRNG.splitMix64(seed & UINT64_MAX);
    const second = PRNG.splitMix64((first + 1n) & UINT64_MAX);
    this.state0 = first;
    this.state1 = second;
  }

  /**
   * Builds a generator from the first 64 bits of a hex digest.
   *
   * @throws {Error} If seedHex is shorter than 16 hex characters
   */
  static fromHex(seedHex: string): PRNG {
    if (!/^[0-9a-fA-F]+$/.test(seedHex) || seedHex.length < SEED_HEX_CHARS) {
      throw new Error(
        `seedHex must be a hex string of at least ${SEED_HEX_CHARS} characters`
      );
    }
    return new PRNG(BigInt('0x' + seedHex.substring(0, SEED_HEX_CHARS)));
  }

  private static splitMix64(value: bigint): bigint {
    let z = value;
    z = ((z ^ (z >> 30n)) * SPLITMIX64_MUL_1) & UINT64_MAX;
    z = ((z ^ (z >> 27n)) * SPLITMIX64_MUL_2) & UINT64_MAX;
    return (z ^ (z >> 31n)) & UINT64_MAX;
  }

  private static rotl(x: bigint, k: bigint): bigint {
    return ((x << k) | (x >> (64n - k))) & UINT64_MAX;
  }

  /** Xoroshiro128+ step */
  private next(): bigint {
    const s0 = this.state0;
    let s1 = this.state1;
    const result = (s0 + s1) & UINT64_MAX;

    s1 ^= s0;
    this.state0 = (PRNG.rotl(s0, ROTL_A) ^ s1 ^ (s1 << SHIFT_B)) & UINT64_MAX;
    this.state1 = PRNG.rotl(s1, ROTL_B);

    return result;
  }

  /**
   * Upper 32 bits of the next 64-bit output, in [0, 2^32 - 1].
   */
  nextUint(): number {
    return Number(this.next() >> 32n) >>> 0;
  }

  /**
   * Float in [0, 1).
   */
  nextFloat(): number {
    return this.nextUint() / UINT32_RANGE;
  }

  choice<T>(items: readonly T[]): T {
    return pickOne(this, items);
  }
}
