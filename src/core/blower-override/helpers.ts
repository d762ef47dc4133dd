/**
 * Blower override helper functions
 */

import { secToMs } from '@utils/time';
import type { BlowerDecision, BlowerInputs, BlowerLatchState, BlowerOverrideConfig } from './types';

/**
 * Check if the blower should be held ON
 *
 * True when the heat call is inactive and it ended this poll or less than
 * the tail window ago. Exactly at the window boundary the override is over.
 */
export function isTailWindowActive(inputs: BlowerInputs, config: BlowerOverrideConfig): boolean {
  if (inputs.heatCallActive) {
    return false;
  }
  return inputs.transitioned || inputs.timeSinceTransitionMs < secToMs(config.BLOWER_TAIL_SEC);
}

/**
 * Decide what the blower override should do this cycle
 *
 * While the tail window is active the reported mode is latched once and the
 * blower is commanded ON until it reports ON. Afterwards the latched mode is
 * commanded every cycle until the thermostat reports it again, which
 * releases the latch.
 *
 * @param inputs - Tracker facts for this cycle
 * @param state - Current latch state
 * @param config - Configuration object
 * @returns Decision
 */
export function decideBlowerOverride(
  inputs: BlowerInputs,
  state: BlowerLatchState,
  config: BlowerOverrideConfig
): BlowerDecision {
  if (isTailWindowActive(inputs, config)) {
    return {
      latch: state.latchedMode === null ? inputs.currentMode : null,
      clearLatch: false,
      command: inputs.currentMode === 'ON' ? null : 'ON'
    };
  }

  if (state.latchedMode === null) {
    return { latch: null, clearLatch: false, command: null };
  }

  if (inputs.currentMode === state.latchedMode) {
    return { latch: null, clearLatch: true, command: null };
  }

  return { latch: null, clearLatch: false, command: state.latchedMode };
}
