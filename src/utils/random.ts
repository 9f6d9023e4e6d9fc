/**
 * Uniform sampling helpers.
 *
 * The random source is injectable so gossip target selection can be
 * made deterministic in tests.
 */

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

/**
 * Draw `count` distinct elements uniformly without replacement.
 * A count at or above the population size returns the whole
 * population (in shuffled order); a count ≤ 0 returns [].
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = Math.random,
): T[] {
  const pool = [...items];
  const take = Math.min(Math.max(Math.floor(count), 0), pool.length);

  // Partial Fisher–Yates: the first `take` slots end up uniformly chosen.
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }

  return pool.slice(0, take);
}
