/**
 * Thermostat client
 * Reads heat-call state and sets the furnace blower mode over HTTP
 */

import { HttpStatusError } from '$types/errors';
import type { BlowerMode, Clock, ThermostatReading } from '$types/common';
import { APP_CONSTANTS } from '@boot/config';
import { sendCommand } from '../transport';
import type { CommandResult, DeviceTransport, HttpResponse } from '../transport';
import { blowerModeToCode, decodeThermostatReading } from './helpers';
import type { ThermostatDevice } from './types';

/**
 * Create a thermostat client on top of a device transport
 *
 * @param transport - Transport bound to the thermostat URL
 * @param clock - Millisecond clock used to time commands
 * @returns Thermostat client
 */
export function createThermostatDevice(transport: DeviceTransport, clock: Clock): ThermostatDevice {
  async function read(): Promise<ThermostatReading> {
    const response = await transport.get();
    if (response.status !== APP_CONSTANTS.HTTP_OK) {
      throw new HttpStatusError(transport.url, response.status, response.body);
    }
    return decodeThermostatReading(response.body, transport.url);
  }

  function setBlowerMode(mode: BlowerMode): Promise<CommandResult> {
    return sendCommand(transport, { fmode: blowerModeToCode(mode) }, clock);
  }

  function rawRead(): Promise<HttpResponse> {
    return transport.get();
  }

  return {
    url: transport.url,
    read: read,
    setBlowerMode: setBlowerMode,
    rawRead: rawRead
  };
}
