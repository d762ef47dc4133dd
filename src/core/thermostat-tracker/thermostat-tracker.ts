/**
 * Thermostat state tracker
 * Polls the thermostat and keeps the heat-call history the fan controllers decide from
 */

import type { BlowerMode, Clock, ThermostatReading } from '$types/common';
import { DeviceError } from '$types/errors';
import type { Logger } from '@logging';
import type { ThermostatDevice } from '@hardware/thermostat';
import { formatReading } from '@hardware/thermostat';
import { secToMs } from '@utils/time';
import {
  calculateTimeSinceTransition,
  detectTransition,
  formatStatusLine,
  getFailureDetails,
  shouldReportFailure
} from './helpers';
import type { PollResult, ThermostatTracker, TrackerConfig, TrackerState } from './types';

/**
 * Tracker external dependencies
 */
export interface TrackerDependencies {
  /** Millisecond clock */
  clock: Clock;
  logger: Logger;
}

/**
 * Create a thermostat tracker
 *
 * A failed poll (no response, non-200, undecodable body) never throws: it
 * bumps the failure count, keeps the last reading and clears the transition
 * flag. Every FAILURE_REPORT_INTERVAL-th consecutive failure is logged at
 * CRITICAL with the last status and body.
 *
 * @param device - Thermostat client
 * @param config - Tracker configuration
 * @param deps - Clock and logger
 * @returns Thermostat tracker
 */
export function createThermostatTracker(
  device: ThermostatDevice,
  config: TrackerConfig,
  deps: TrackerDependencies
): ThermostatTracker {
  const tailMs = secToMs(config.BLOWER_TAIL_SEC);
  const state: TrackerState = {
    currentReading: null,
    lastTransitionAt: null,
    transitionedThisPoll: false,
    consecutiveFailures: 0
  };

  function recordFailure(error: DeviceError): PollResult {
    state.consecutiveFailures++;
    deps.logger.info('Thermostat read failed (' + state.consecutiveFailures + ' in a row): ' + error.message);

    if (shouldReportFailure(state.consecutiveFailures, config.FAILURE_REPORT_INTERVAL)) {
      const details = getFailureDetails(error);
      deps.logger.critical(
        'Thermostat ' + device.url + ' failed to get data ' + state.consecutiveFailures +
        ' attempts. Returned code: ' + details.status + ', response: ' + details.body
      );
    }

    return { ok: false, error: error };
  }

  function recordReading(reading: ThermostatReading): PollResult {
    state.transitionedThisPoll = detectTransition(state.currentReading, reading);
    if (state.transitionedThisPoll) {
      state.lastTransitionAt = deps.clock();
      deps.logger.info('Heat call ' + (reading.heatCallActive ? 'started' : 'ended'));
    }
    state.consecutiveFailures = 0;
    state.currentReading = reading;
    return { ok: true, reading: reading };
  }

  async function poll(): Promise<PollResult> {
    state.transitionedThisPoll = false;

    let reading: ThermostatReading;
    try {
      reading = await device.read();
    } catch (err) {
      if (err instanceof DeviceError) {
        return recordFailure(err);
      }
      throw err;
    }

    return recordReading(reading);
  }

  function isHeatCallActive(): boolean {
    return state.currentReading !== null && state.currentReading.heatCallActive;
  }

  function blowerMode(): BlowerMode | null {
    return state.currentReading === null ? null : state.currentReading.blowerMode;
  }

  function transitionedThisPoll(): boolean {
    return state.transitionedThisPoll;
  }

  function timeSinceTransitionMs(): number {
    return calculateTimeSinceTransition(deps.clock(), state.lastTransitionAt, tailMs);
  }

  function consecutiveFailures(): number {
    return state.consecutiveFailures;
  }

  function currentReading(): ThermostatReading | null {
    return state.currentReading;
  }

  function describe(): string {
    const readingLine = state.currentReading === null ? 'State: no reading' : formatReading(state.currentReading);
    return formatStatusLine(readingLine, timeSinceTransitionMs());
  }

  function getState(): Readonly<TrackerState> {
    return { ...state };
  }

  return {
    poll: poll,
    isHeatCallActive: isHeatCallActive,
    blowerMode: blowerMode,
    transitionedThisPoll: transitionedThisPoll,
    timeSinceTransitionMs: timeSinceTransitionMs,
    consecutiveFailures: consecutiveFailures,
    currentReading: currentReading,
    describe: describe,
    getState: getState
  };
}
