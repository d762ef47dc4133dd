/**
 * Device command execution
 * Sends one state-changing command and logs its outcome
 */

import { CommandFailure, TransportError } from '$types/errors';
import type { Logger } from '@logging';
import { assertCommandOk } from '@hardware/transport';
import type { CommandResult } from '@hardware/transport';
import type { CommandRequest } from './types';

function formatElapsed(result: CommandResult | null): string {
  return result === null ? '' : ' (' + result.elapsedMs + ' ms)';
}

/**
 * Execute a device command
 *
 * Success is logged at INFO with the status and round-trip time. A rejected
 * command (CommandFailure) or an unreachable device (TransportError) is logged
 * at WARNING and reported as false; the caller retries on a later cycle.
 *
 * @param request - Command to send
 * @param logger - Logger instance
 * @returns True if the device accepted the command
 */
export async function executeCommand(request: CommandRequest, logger: Logger): Promise<boolean> {
  let result: CommandResult | null = null;

  try {
    result = await request.send();
    assertCommandOk(result, request.url, request.command);
    logger.info(request.description + ' on ' + request.url + ': HTTP ' + result.status + formatElapsed(result));
    return true;
  } catch (err) {
    if (err instanceof CommandFailure) {
      logger.warning(request.description + ' failed: ' + err.message + ', response: ' + err.body + formatElapsed(result));
      return false;
    }
    if (err instanceof TransportError) {
      logger.warning(request.description + ' on ' + request.url + ' failed: ' + err.message);
      return false;
    }
    throw err;
  }
}
