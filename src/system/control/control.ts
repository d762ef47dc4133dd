/**
 * Control loop implementation
 */

import { calculateSleepMs } from '@utils/time';
import { formatCrash, updateFans } from './helpers';
import type { Controller, LoopDependencies } from './types';

/**
 * Run one control loop iteration
 *
 * Polls the thermostat; only on success every fan is updated and the status
 * line is logged. Device failures are absorbed by the tracker and the
 * controllers. Anything else is logged at CRITICAL and the iteration ends.
 *
 * @param controller - Tracker, fans and logger
 * @returns True if the poll succeeded and every fan was updated
 */
export async function run(controller: Controller): Promise<boolean> {
  const tracker = controller.tracker;
  const logger = controller.logger;

  try {
    const result = await tracker.poll();
    if (!result.ok) {
      return false;
    }

    await updateFans(controller.fans, tracker);
    logger.info(tracker.describe());
    return true;
  } catch (e) {
    logger.critical(formatCrash(e));
    return false;
  }
}

/**
 * Run the control loop at a fixed cadence
 *
 * Each iteration is followed by a sleep of max(0, period - elapsed); an
 * overrunning iteration is followed immediately by the next one and missed
 * cycles are not caught up.
 *
 * @param controller - Tracker, fans and logger
 * @param deps - Period, clock, sleep and an optional stop condition
 */
export async function runControlLoop(controller: Controller, deps: LoopDependencies): Promise<void> {
  const shouldContinue = deps.shouldContinue || function() {
    return true;
  };

  while (shouldContinue()) {
    const loopStart = deps.clock();
    await run(controller);
    await deps.sleep(calculateSleepMs(deps.periodMs, deps.clock() - loopStart));
  }
}
