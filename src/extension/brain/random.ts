/**
 * Random source used for every choice the brain makes while generating.
 * Same contract as Math.random: a float in [0, 1).
 */
export type RandomSource = () => number

export const defaultRandom: RandomSource = Math.random

/** Uniform integer in [0, n). */
export function randomInt(random: RandomSource, n: number): number {
  return Math.min(n - 1, Math.floor(random() * n))
}

/**
 * Small seeded generator (mulberry32) so tests and replays can reproduce a
 * walk exactly.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}
