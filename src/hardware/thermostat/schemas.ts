/**
 * Zod validation schemas for thermostat responses
 */

import { z } from 'zod';

// State returned by GET on the thermostat endpoint
export const ThermostatStateSchema = z.object({
  temp: z.number(),
  t_heat: z.number(),
  tstate: z.number().int(),
  fmode: z.number().int(),
}).passthrough();

export type ThermostatStateResponse = z.infer<typeof ThermostatStateSchema>;
