import { setTimeout as delay } from 'node:timers/promises';

export interface BackoffOptions {
  /** Exponential base, in seconds */
  base: number;
  /** Cap on a single delay, in seconds */
  max: number;
  /** Upper bound of the random jitter added to each delay, in seconds */
  jitter?: number;
}

export type Sleep = (ms: number) => Promise<void>;

/** Source of uniform random numbers in [0, 1) */
export type RandomSource = () => number;

/**
 * Delay before retrying after the given failed attempt (0-based).
 * Grows as base ^ attempt plus jitter, capped at max.
 * @returns Delay in milliseconds
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: RandomSource = Math.random
): number {
  const jitter = random() * (options.jitter ?? 1);
  const seconds = Math.min(Math.pow(options.base, attempt) + jitter, options.max);
  return Math.round(seconds * 1000);
}

export const sleep: Sleep = async (ms) => {
  if (ms > 0) {
    await delay(ms);
  }
};
