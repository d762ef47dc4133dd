/**
 * Ceiling fan client
 * Speed commands, speed queries and reboot over HTTP
 */

import { TransportError } from '$types/errors';
import type { Clock, FanSpeed } from '$types/common';
import { APP_CONSTANTS } from '@boot/config';
import { sendCommand } from '../transport';
import type { CommandResult, DeviceTransport, HttpResponse } from '../transport';
import { QUERY_PAYLOAD, REBOOT_PAYLOAD, decodeFanSpeed } from './helpers';
import type { CeilingFanDevice } from './types';

/**
 * Create a ceiling fan client on top of a device transport
 *
 * @param transport - Transport bound to the fan URL
 * @param clock - Millisecond clock used to time commands
 * @returns Ceiling fan client
 */
export function createCeilingFanDevice(transport: DeviceTransport, clock: Clock): CeilingFanDevice {
  function setSpeed(speed: FanSpeed): Promise<CommandResult> {
    return sendCommand(transport, { fanSpeed: speed }, clock);
  }

  async function querySpeed(): Promise<FanSpeed | null> {
    let response: HttpResponse;
    try {
      response = await transport.post(QUERY_PAYLOAD);
    } catch (err) {
      if (err instanceof TransportError) {
        return null;
      }
      throw err;
    }

    if (response.status !== APP_CONSTANTS.HTTP_OK) {
      return null;
    }
    return decodeFanSpeed(response.body);
  }

  async function reboot(): Promise<void> {
    try {
      await transport.post(REBOOT_PAYLOAD);
    } catch (err) {
      // Expected: the fan restarts before it answers
      if (!(err instanceof TransportError)) {
        throw err;
      }
    }
  }

  function rawQuery(): Promise<HttpResponse> {
    return transport.post(QUERY_PAYLOAD);
  }

  return {
    url: transport.url,
    setSpeed: setSpeed,
    querySpeed: querySpeed,
    reboot: reboot,
    rawQuery: rawQuery
  };
}
