/**
 * Ceiling fan synchronizer helper functions
 */

import { secToMs } from '@utils/time';
import type { FanSyncConfig, FanSyncDecision, FanSyncInputs, FanSyncState } from './types';

/**
 * Settle delay for the current heat state
 * @returns Delay in ms
 */
export function getSettleDelayMs(heatCallActive: boolean, config: FanSyncConfig): number {
  return secToMs(heatCallActive ? config.FAN_ON_DELAY_SEC : config.FAN_OFF_DELAY_SEC);
}

/**
 * Decide what a ceiling fan should do this cycle
 *
 * A transition re-arms the fan and nothing else happens that cycle. Once
 * armed, the speed for the current heat state is sent as soon as the time
 * since transition is strictly past the settle delay.
 *
 * @param inputs - Tracker facts for this cycle
 * @param state - Current synchronizer state
 * @param config - Configuration object
 * @returns Decision
 */
export function decideFanSync(
  inputs: FanSyncInputs,
  state: FanSyncState,
  config: FanSyncConfig
): FanSyncDecision {
  if (inputs.transitioned) {
    return { action: 'reset' };
  }

  if (state.appliedSinceTransition) {
    return { action: 'none' };
  }

  if (inputs.timeSinceTransitionMs > getSettleDelayMs(inputs.heatCallActive, config)) {
    return {
      action: 'set',
      speed: inputs.heatCallActive ? config.HEAT_ON_FAN_SPEED : config.HEAT_OFF_FAN_SPEED
    };
  }

  return { action: 'none' };
}
