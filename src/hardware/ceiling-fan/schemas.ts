/**
 * Zod validation schemas for ceiling fan responses
 */

import { z } from 'zod';

// Shadow data returned by {"queryDynamicShadowData": 1}
export const FanShadowSchema = z.object({
  fanSpeed: z.number().int(),
}).passthrough();
