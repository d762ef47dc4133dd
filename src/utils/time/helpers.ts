/**
 * Time helper functions
 */

import { TIME_CONSTANTS } from '../constants';

/**
 * Calculate how long to sleep so that iterations start on a fixed cadence
 *
 * An iteration that overran its period gets no sleep at all; missed cycles
 * are not caught up.
 *
 * @param periodMs - Loop period in milliseconds
 * @param elapsedMs - Time the iteration took in milliseconds
 * @returns Sleep duration in milliseconds, never negative
 */
export function calculateSleepMs(periodMs: number, elapsedMs: number): number {
  return Math.max(0, periodMs - elapsedMs);
}

/**
 * Convert seconds to milliseconds
 */
export function secToMs(seconds: number): number {
  return seconds * TIME_CONSTANTS.MS_PER_SECOND;
}

/**
 * Convert milliseconds to whole seconds (rounded down)
 */
export function msToWholeSec(ms: number): number {
  return Math.floor(ms / TIME_CONSTANTS.MS_PER_SECOND);
}
