/**
 * Thermostat tracker helper functions
 */

import type { ThermostatReading } from '$types/common';
import { DeviceError, HttpStatusError, ParseError } from '$types/errors';
import { APP_CONSTANTS } from '@boot/config';
import { msToWholeSec } from '@utils/time';
import type { FailureDetails } from './types';

/**
 * Check if the heat call flipped between two readings
 *
 * The first reading after start-up is never a transition.
 *
 * @param previous - Reading before this poll (null before the first success)
 * @param next - Reading from this poll
 */
export function detectTransition(previous: ThermostatReading | null, next: ThermostatReading): boolean {
  return previous !== null && previous.heatCallActive !== next.heatCallActive;
}

/**
 * Time since the last transition
 *
 * @param nowMs - Current time in ms
 * @param lastTransitionAt - Time of the last transition, null if none yet
 * @param tailMs - Value reported before the first transition
 */
export function calculateTimeSinceTransition(
  nowMs: number,
  lastTransitionAt: number | null,
  tailMs: number
): number {
  if (lastTransitionAt === null) {
    return tailMs;
  }
  return nowMs - lastTransitionAt;
}

/**
 * Whether this failure count is due a CRITICAL report
 * @param failures - Consecutive failure count (already incremented)
 * @param interval - Report every Nth failure
 */
export function shouldReportFailure(failures: number, interval: number): boolean {
  return failures > 0 && failures % interval === 0;
}

/**
 * Extract the status and body to report for a failed read
 * @param error - Read failure
 */
export function getFailureDetails(error: DeviceError): FailureDetails {
  if (error instanceof HttpStatusError) {
    return { status: String(error.status), body: error.body };
  }
  if (error instanceof ParseError) {
    return { status: String(APP_CONSTANTS.HTTP_OK), body: error.body };
  }
  return { status: 'none', body: error.message };
}

/**
 * Render the status line
 *
 * @param readingLine - Formatted reading, e.g. 'State: Temp: 68.5 Target: 70 Heat On: true Blower: AUTO'
 * @param sinceMs - Time since transition in ms
 * @returns e.g. '... | Time since transition: 42s'
 */
export function formatStatusLine(readingLine: string, sinceMs: number): string {
  return readingLine + ' | Time since transition: ' + msToWholeSec(sinceMs) + 's';
}
