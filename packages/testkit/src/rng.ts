/**
 * Deterministic PRNG for property tests (32-bit LCG).
 * Same seed, same sequence, on every platform.
 */

export type Rng = Readonly<{
  /** Next unsigned 32-bit value. */
  u32: () => number;
  /** Uniform in [0, 1). */
  float: () => number;
  /** Uniform integer in [min, max]. */
  int: (min: number, max: number) => number;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const u32 = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
  return Object.freeze({
    u32,
    float: () => u32() / 4294967296,
    int: (min: number, max: number) => min + (u32() % (max - min + 1)),
  });
}
