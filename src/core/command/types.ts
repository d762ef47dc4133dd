/**
 * Device command type definitions
 */

import type { CommandResult } from '@hardware/transport';

/**
 * One state-changing command
 */
export interface CommandRequest {
  /** Device URL */
  url: string;
  /** Human-readable action, e.g. 'Set fan speed to 2' */
  description: string;
  /** Compact command, e.g. 'fanSpeed=2' */
  command: string;
  /** Send the command */
  send(): Promise<CommandResult>;
}
