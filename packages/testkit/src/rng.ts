/**
 * packages/testkit/src/rng.ts — Seeded pseudo-random numbers for property tests.
 *
 * mulberry32: small state, full 32-bit period, identical sequences on every
 * platform for the same seed.
 */

export type Rng = Readonly<{
  /** Uniform in [0, 1). */
  next: () => number;
  /** Uniform integer in [min, max] (inclusive). */
  int: (min: number, max: number) => number;
  /** Uniform element of a non-empty array. */
  pick: <T>(items: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  let s = seed >>> 0;

  function next(): number {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  function int(min: number, max: number): number {
    return min + Math.floor(next() * (max - min + 1));
  }

  function pick<T>(items: readonly T[]): T {
    const item = items[int(0, items.length - 1)];
    if (item === undefined) throw new Error("createRng.pick: empty array");
    return item;
  }

  return Object.freeze({ next, int, pick });
}
