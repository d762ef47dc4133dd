/**
 * Ceiling fan synchronizer type definitions
 */

import type { FanSpeed } from '$types/common';

/**
 * Per-fan synchronizer state
 */
export interface FanSyncState {
  /** Whether the speed for the current heat state has been applied since the last transition */
  appliedSinceTransition: boolean;
}

/**
 * Synchronizer configuration
 */
export interface FanSyncConfig {
  /** Settle delay (seconds) after heat-on before speeding up */
  FAN_ON_DELAY_SEC: number;

  /** Settle delay (seconds) after heat-off before slowing down */
  FAN_OFF_DELAY_SEC: number;

  /** Speed while the heat call is active */
  HEAT_ON_FAN_SPEED: FanSpeed;

  /** Speed while the heat call is inactive */
  HEAT_OFF_FAN_SPEED: FanSpeed;
}

/**
 * Tracker facts the synchronizer decides from
 */
export interface FanSyncInputs {
  transitioned: boolean;
  heatCallActive: boolean;
  timeSinceTransitionMs: number;
}

/**
 * What to do this cycle
 */
export type FanSyncDecision =
  | { action: 'reset' }
  | { action: 'set'; speed: FanSpeed }
  | { action: 'none' };
