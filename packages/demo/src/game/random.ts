/**
 * Deterministic random source for reproducible sessions.
 * Linear congruential generator, uniform in [0, 1).
 */
export function createSeededRandom(seed: number): () => number {
  let state = Math.trunc(seed) & 0x7fffffff

  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff
    return state / 0x80000000
  }
}
