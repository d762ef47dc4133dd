/**
 * Ceiling fan synchronizer
 * Follows the furnace heat call with a debounced speed change, once per stable interval
 */

import type { Logger } from '@logging';
import type { CeilingFanDevice } from '@hardware/ceiling-fan';
import { describeCommand } from '@hardware/transport';
import { TransportError } from '$types/errors';
import { executeCommand } from '../command';
import type { ControlledFan, DiagnosticReport, TrackerView } from '../types';
import { decideFanSync } from './helpers';
import type { FanSyncConfig, FanSyncState } from './types';

/**
 * Ceiling fan synchronizer instance
 */
export interface CeilingFanSync extends ControlledFan {
  /** Snapshot of the internal state (for testing/monitoring) */
  getState(): Readonly<FanSyncState>;
}

/**
 * Create a synchronizer for one ceiling fan
 *
 * @param device - Ceiling fan client
 * @param config - Delays and speeds
 * @param logger - Logger instance
 * @returns Controlled fan
 */
export function createCeilingFanSync(
  device: CeilingFanDevice,
  config: FanSyncConfig,
  logger: Logger
): CeilingFanSync {
  const state: FanSyncState = { appliedSinceTransition: false };

  async function update(tracker: TrackerView): Promise<void> {
    const decision = decideFanSync(
      {
        transitioned: tracker.transitionedThisPoll(),
        heatCallActive: tracker.isHeatCallActive(),
        timeSinceTransitionMs: tracker.timeSinceTransitionMs()
      },
      state,
      config
    );

    if (decision.action === 'reset') {
      state.appliedSinceTransition = false;
      return;
    }

    if (decision.action === 'set') {
      const speed = decision.speed;
      state.appliedSinceTransition = await executeCommand({
        url: device.url,
        description: 'Set fan speed to ' + speed,
        command: describeCommand({ fanSpeed: speed }),
        send: () => device.setSpeed(speed)
      }, logger);
    }
  }

  async function debug(): Promise<DiagnosticReport> {
    try {
      const response = await device.rawQuery();
      return { label: 'Fan query', url: device.url, status: response.status, body: response.body, error: null };
    } catch (err) {
      if (err instanceof TransportError) {
        return { label: 'Fan query', url: device.url, status: null, body: '', error: err.message };
      }
      throw err;
    }
  }

  function getState(): Readonly<FanSyncState> {
    return { ...state };
  }

  return {
    name: 'Ceiling fan ' + device.url,
    update: update,
    debug: debug,
    getState: getState
  };
}
