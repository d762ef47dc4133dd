/**
 * Time utility functions
 */

/**
 * Get monotonic uptime in whole seconds
 * @returns Seconds since process start
 */
export function now(): number {
  return Math.floor(nowMs() / 1000);
}

/**
 * Get a monotonic timestamp in milliseconds
 *
 * Counts from process start and never steps with the system clock, so every
 * duration (settle delays, tail window, loop elapsed time) is measured with it.
 * Use `Date` only for wall-clock display.
 *
 * @returns Milliseconds since process start
 */
export function nowMs(): number {
  return performance.now();
}

/**
 * Resolve after the given number of milliseconds
 * @param ms - Delay in milliseconds (negative values resolve immediately)
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(function(resolve) {
    setTimeout(resolve, Math.max(0, ms));
  });
}
