/**
 * Ceiling fan helper functions
 */

import type { FanSpeed } from '$types/common';
import { FanShadowSchema } from './schemas';

export const QUERY_PAYLOAD = { queryDynamicShadowData: 1 } as const;
export const REBOOT_PAYLOAD = { reboot: 1 } as const;

/**
 * Extract the fan speed from a shadow-data body
 * @param body - Response body
 * @returns Speed, or null when the body is not valid shadow data
 */
export function decodeFanSpeed(body: string): FanSpeed | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (_err) {
    return null;
  }

  const parsed = FanShadowSchema.safeParse(json);
  return parsed.success ? parsed.data.fanSpeed : null;
}
