/**
 * Transport helper functions
 */

import { CommandFailure } from '$types/errors';
import { APP_CONSTANTS } from '@boot/config';
import type { Clock } from '$types/common';
import type { CommandPayload, CommandResult, DeviceTransport } from './types';

/**
 * POST a command and measure how long the device took to answer
 *
 * @param transport - Device transport
 * @param payload - Command body
 * @param clock - Millisecond clock
 * @returns Command result; rejects with TransportError when no response arrives
 */
export async function sendCommand(
  transport: DeviceTransport,
  payload: CommandPayload,
  clock: Clock
): Promise<CommandResult> {
  const startedAt = clock();
  const response = await transport.post(payload);
  return {
    ok: response.status === APP_CONSTANTS.HTTP_OK,
    status: response.status,
    body: response.body,
    elapsedMs: clock() - startedAt
  };
}

/**
 * Throw a CommandFailure unless the device accepted the command
 *
 * @param result - Command result
 * @param url - Device URL
 * @param command - Short description of the command, e.g. 'fanSpeed=2'
 */
export function assertCommandOk(result: CommandResult, url: string, command: string): void {
  if (!result.ok) {
    throw new CommandFailure(url, command, result.status, result.body);
  }
}

/**
 * Render a payload as the compact command description used in log lines
 * @param payload - Command body
 * @returns e.g. 'fanSpeed=2'
 */
export function describeCommand(payload: CommandPayload): string {
  return Object.keys(payload).map((key) => key + '=' + payload[key]).join(' ');
}
