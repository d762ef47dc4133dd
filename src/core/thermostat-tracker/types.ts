/**
 * Thermostat tracker type definitions
 */

import type { ThermostatReading } from '$types/common';
import type { DeviceError } from '$types/errors';
import type { TrackerView } from '../types';

/**
 * Tracker state
 */
export interface TrackerState {
  /** Last successfully decoded reading, kept across failed polls */
  currentReading: ThermostatReading | null;

  /** Timestamp (ms) of the last heat-call transition, null until one is seen */
  lastTransitionAt: number | null;

  /** Whether the most recent poll changed the heat call */
  transitionedThisPoll: boolean;

  /** Read failures since the last successful poll */
  consecutiveFailures: number;
}

/**
 * Tracker configuration
 */
export interface TrackerConfig {
  /** Reported as time since transition before the first transition */
  BLOWER_TAIL_SEC: number;

  /** Every Nth consecutive failure is logged at CRITICAL */
  FAILURE_REPORT_INTERVAL: number;
}

/**
 * Outcome of one poll
 */
export type PollResult =
  | { ok: true; reading: ThermostatReading }
  | { ok: false; error: DeviceError };

/**
 * Status code and body to report for a failed read
 */
export interface FailureDetails {
  /** HTTP status, or 'none' when no response arrived */
  status: string;
  /** Response body, or the transport error message */
  body: string;
}

/**
 * Thermostat tracker
 */
export interface ThermostatTracker extends TrackerView {
  /** Read the thermostat once and fold the result into the state */
  poll(): Promise<PollResult>;
  /** Snapshot of the internal state (for testing/monitoring) */
  getState(): Readonly<TrackerState>;
}
