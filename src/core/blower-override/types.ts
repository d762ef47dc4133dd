/**
 * Blower override type definitions
 */

import type { BlowerMode } from '$types/common';

/**
 * Blower latch state
 */
export interface BlowerLatchState {
  /** Mode in effect before the override took over, null when no override is active */
  latchedMode: BlowerMode | null;
}

/**
 * Blower override configuration
 */
export interface BlowerOverrideConfig {
  /** How long (seconds) the blower is forced ON after the heat call ends */
  BLOWER_TAIL_SEC: number;
}

/**
 * Tracker facts the override decides from
 */
export interface BlowerInputs {
  transitioned: boolean;
  heatCallActive: boolean;
  timeSinceTransitionMs: number;
  /** Blower mode the thermostat reports, null before any reading */
  currentMode: BlowerMode | null;
}

/**
 * What to do this cycle
 */
export interface BlowerDecision {
  /** Mode to latch now, null to leave the latch as it is */
  latch: BlowerMode | null;
  /** Whether the latch is released */
  clearLatch: boolean;
  /** Mode to command, null for no command */
  command: BlowerMode | null;
}
