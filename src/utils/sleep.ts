/** Sleep helpers for the cooperative background loops. */

export type SleepFn = (ms: number) => Promise<void>;

/** Sleep for the specified number of milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Longest single wait while a loop sleeps; bounds stop latency. */
export const SLEEP_SLICE_MS = 1_000;

/**
 * Sleep `totalMs` in slices, returning early once `keepGoing()` turns
 * false. A stop request is therefore honoured within one slice.
 */
export async function sleepWhile(
  totalMs: number,
  keepGoing: () => boolean,
  sleepFn: SleepFn = sleep,
  sliceMs: number = SLEEP_SLICE_MS,
): Promise<void> {
  let remaining = totalMs;
  while (remaining > 0 && keepGoing()) {
    const step = Math.min(sliceMs, remaining);
    await sleepFn(step);
    remaining -= step;
  }
}
