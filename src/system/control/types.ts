/**
 * Control module type definitions
 */

import type { Clock } from '$types/common';
import type { ControlledFan, ThermostatTracker } from '@core';
import type { Logger } from '@logging';

/**
 * Everything one control loop iteration touches
 */
export interface Controller {
  /** Thermostat tracker, polled once per iteration */
  tracker: ThermostatTracker;
  /** Fans driven after a successful poll, in this order */
  fans: ControlledFan[];
  logger: Logger;
}

/**
 * Scheduling dependencies
 */
export interface LoopDependencies {
  /** Loop period in milliseconds */
  periodMs: number;
  /** Millisecond clock */
  clock: Clock;
  /** Resolve after the given number of milliseconds */
  sleep: (ms: number) => Promise<void>;
  /** Checked before every iteration; runs forever when omitted */
  shouldContinue?: () => boolean;
}
