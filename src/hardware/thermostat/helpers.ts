/**
 * Thermostat helper functions
 * Pure decoding of thermostat responses
 */

import { ParseError } from '$types/errors';
import type { BlowerMode, ThermostatReading } from '$types/common';
import { APP_CONSTANTS } from '@boot/config';
import { ThermostatStateSchema } from './schemas';
import type { ThermostatStateResponse } from './schemas';

const BLOWER_MODES: readonly BlowerMode[] = ['AUTO', 'CIRCULATE', 'ON'];

/**
 * Map a thermostat fmode code to a blower mode
 * @param code - fmode value from the device
 * @returns Blower mode, or null for an unknown code
 */
export function blowerModeFromCode(code: number): BlowerMode | null {
  for (let i = 0; i < BLOWER_MODES.length; i++) {
    if (APP_CONSTANTS.BLOWER_MODE_CODES[BLOWER_MODES[i]] === code) {
      return BLOWER_MODES[i];
    }
  }
  return null;
}

/**
 * Map a blower mode to its thermostat fmode code
 */
export function blowerModeToCode(mode: BlowerMode): number {
  return APP_CONSTANTS.BLOWER_MODE_CODES[mode];
}

/**
 * Decode a thermostat state body
 *
 * Fails with a ParseError for an empty body, invalid JSON, a missing or
 * mistyped field, or an fmode code outside the known set.
 *
 * @param body - Response body
 * @param url - Thermostat URL (carried on the error)
 * @returns Decoded reading
 */
export function decodeThermostatReading(body: string, url: string): ThermostatReading {
  if (body.length === 0) {
    throw new ParseError('Empty thermostat data returned', url, body);
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ParseError('Error parsing thermostat data: ' + (err instanceof Error ? err.message : String(err)), url, body);
  }

  const parsed = ThermostatStateSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ParseError('Missing fields in thermostat data: ' + fields, url, body);
  }

  return readingFromState(parsed.data, url, body);
}

/**
 * Map a schema-checked state to a reading
 *
 * @param state - Validated thermostat state
 * @param url - Thermostat URL (carried on the error)
 * @param body - Raw body (carried on the error)
 * @returns Reading
 * @throws ParseError for an fmode code outside the known set
 */
export function readingFromState(state: ThermostatStateResponse, url: string, body: string): ThermostatReading {
  const blowerMode = blowerModeFromCode(state.fmode);
  if (blowerMode === null) {
    throw new ParseError('Unknown fmode code ' + state.fmode, url, body);
  }

  return {
    temperature: state.temp,
    targetTemperature: state.t_heat,
    heatCallActive: state.tstate === APP_CONSTANTS.HEAT_ACTIVE_TSTATE,
    blowerMode: blowerMode
  };
}

/**
 * Render a reading for the status line
 * @returns e.g. 'State: Temp: 68.5 Target: 70 Heat On: true Blower: AUTO'
 */
export function formatReading(reading: ThermostatReading): string {
  return 'State: Temp: ' + reading.temperature +
    ' Target: ' + reading.targetTemperature +
    ' Heat On: ' + reading.heatCallActive +
    ' Blower: ' + reading.blowerMode;
}
