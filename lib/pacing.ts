/**
 * Delays between vendor calls.
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PacerOptions {
  minDelayMs: number;
  maxDelayMs: number;
  sleep?: Sleep;
  random?: () => number;
}

/**
 * Returns a function that waits a random delay in [minDelayMs, maxDelayMs]
 * and resolves to the delay it waited.
 */
export function createPacer(options: PacerOptions): () => Promise<number> {
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const span = Math.max(0, options.maxDelayMs - options.minDelayMs);

  return async () => {
    const delay = options.minDelayMs + Math.floor(random() * (span + 1));
    if (delay > 0) {
      await wait(delay);
    }
    return delay;
  };
}
