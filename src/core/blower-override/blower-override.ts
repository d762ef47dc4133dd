/**
 * Furnace blower override
 * Keeps the blower running for a tail window after the heat call ends, then restores the previous mode
 */

import type { BlowerMode } from '$types/common';
import { TransportError } from '$types/errors';
import type { Logger } from '@logging';
import type { ThermostatDevice } from '@hardware/thermostat';
import { blowerModeToCode } from '@hardware/thermostat';
import { describeCommand } from '@hardware/transport';
import { executeCommand } from '../command';
import type { ControlledFan, DiagnosticReport, TrackerView } from '../types';
import { decideBlowerOverride } from './helpers';
import type { BlowerLatchState, BlowerOverrideConfig } from './types';

/**
 * Blower override instance
 */
export interface BlowerOverride extends ControlledFan {
  /** Snapshot of the latch (for testing/monitoring) */
  getState(): Readonly<BlowerLatchState>;
}

/**
 * Create the blower override
 *
 * @param device - Thermostat client (the blower is commanded through the thermostat)
 * @param config - Tail window
 * @param logger - Logger instance
 * @returns Controlled fan
 */
export function createBlowerOverride(
  device: ThermostatDevice,
  config: BlowerOverrideConfig,
  logger: Logger
): BlowerOverride {
  const state: BlowerLatchState = { latchedMode: null };

  function setMode(mode: BlowerMode): Promise<boolean> {
    return executeCommand({
      url: device.url,
      description: 'Set blower mode to ' + mode,
      command: describeCommand({ fmode: blowerModeToCode(mode) }),
      send: () => device.setBlowerMode(mode)
    }, logger);
  }

  async function update(tracker: TrackerView): Promise<void> {
    const decision = decideBlowerOverride(
      {
        transitioned: tracker.transitionedThisPoll(),
        heatCallActive: tracker.isHeatCallActive(),
        timeSinceTransitionMs: tracker.timeSinceTransitionMs(),
        currentMode: tracker.blowerMode()
      },
      state,
      config
    );

    if (decision.latch !== null) {
      state.latchedMode = decision.latch;
      logger.info('Latched blower mode ' + decision.latch);
    }

    if (decision.clearLatch) {
      logger.debug('Blower restored to ' + state.latchedMode + ', latch released');
      state.latchedMode = null;
    }

    if (decision.command !== null) {
      await setMode(decision.command);
    }
  }

  async function debug(): Promise<DiagnosticReport> {
    try {
      const response = await device.rawRead();
      return { label: 'Thermostat', url: device.url, status: response.status, body: response.body, error: null };
    } catch (err) {
      if (err instanceof TransportError) {
        return { label: 'Thermostat', url: device.url, status: null, body: '', error: err.message };
      }
      throw err;
    }
  }

  function getState(): Readonly<BlowerLatchState> {
    return { ...state };
  }

  return {
    name: 'Furnace blower',
    update: update,
    debug: debug,
    getState: getState
  };
}
