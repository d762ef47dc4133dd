/**
 * Types shared by every controlled fan
 */

import type { BlowerMode, ThermostatReading } from '$types/common';

/**
 * Read-only view of the thermostat tracker
 * Controllers decide from this; they never feed back into the tracker.
 */
export interface TrackerView {
  /** False before any reading */
  isHeatCallActive(): boolean;
  /** Null before any reading */
  blowerMode(): BlowerMode | null;
  /** True only right after a successful poll that changed the heat call */
  transitionedThisPoll(): boolean;
  /** Time since the last heat-call transition (the blower tail window before the first one) */
  timeSinceTransitionMs(): number;
  consecutiveFailures(): number;
  currentReading(): ThermostatReading | null;
  /** Status line for the current state */
  describe(): string;
}

/**
 * Raw device response captured by the diagnostics mode
 */
export interface DiagnosticReport {
  /** What was queried, e.g. 'Fan query' */
  label: string;
  /** Device URL */
  url: string;
  /** HTTP status, or null when the request failed */
  status: number | null;
  /** Raw response body ('' when the request failed) */
  body: string;
  /** Transport error message, or null on a response */
  error: string | null;
}

/**
 * A fan driven once per control loop iteration
 */
export interface ControlledFan {
  /** Name used in log lines */
  readonly name: string;
  /** Apply the fan's policy against the freshly polled tracker */
  update(tracker: TrackerView): Promise<void>;
  /** Query the device once for the diagnostics mode */
  debug(): Promise<DiagnosticReport>;
}
