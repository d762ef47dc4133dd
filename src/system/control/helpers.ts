/**
 * Control loop helper functions
 */

import type { ControlledFan, TrackerView } from '@core';

/**
 * Update every fan once, in order, one request at a time
 * @param fans - Controlled fans
 * @param tracker - Freshly polled tracker
 */
export async function updateFans(fans: readonly ControlledFan[], tracker: TrackerView): Promise<void> {
  for (let i = 0; i < fans.length; i++) {
    await fans[i].update(tracker);
  }
}

/**
 * Render an unexpected iteration error
 */
export function formatCrash(e: unknown): string {
  const errorMsg = e instanceof Error ? e.message : String(e);
  return 'Control loop crashed: ' + errorMsg;
}
