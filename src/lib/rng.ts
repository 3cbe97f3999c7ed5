/**
 * Seeded random number generation
 *
 * Tournaments and random agents take an Rng so that a run can be repeated
 * exactly from its seed.
 */

export type Rng = () => number

/**
 * mulberry32 PRNG: returns floats in [0, 1).
 */
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0
  return function () {
    t += 0x6d2b79f5
    let x = t
    x = Math.imul(x ^ (x >>> 15), x | 1)
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

export function pickOne<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) throw new Error('pickOne called with empty array')
  const index = Math.floor(rng() * items.length)
  return items[Math.min(index, items.length - 1)]
}
