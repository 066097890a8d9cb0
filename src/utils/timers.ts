/** Largest delay setTimeout accepts; anything above it fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * setTimeout for delays of any length, chaining timers past the 32-bit
 * limit. Returns a function that cancels whichever timer is pending.
 */
export function setLongTimeout(fn: () => void, ms: number): () => void {
  let timer: NodeJS.Timeout | undefined;

  const schedule = (remaining: number): void => {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
    timer = setTimeout(() => {
      if (remaining > step) schedule(remaining - step);
      else fn();
    }, step);
  };

  schedule(ms);
  return () => clearTimeout(timer);
}
