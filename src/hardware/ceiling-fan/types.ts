/**
 * Ceiling fan device type definitions
 */

import type { FanSpeed } from '$types/common';
import type { CommandResult, HttpResponse } from '../transport';

/**
 * Ceiling fan client
 */
export interface CeilingFanDevice {
  /** Fan URL */
  readonly url: string;
  /** Set the fan speed; rejects with TransportError when unreachable */
  setSpeed(speed: FanSpeed): Promise<CommandResult>;
  /** Current speed, or null when it could not be read */
  querySpeed(): Promise<FanSpeed | null>;
  /** Reboot the fan; the device drops the connection instead of answering */
  reboot(): Promise<void>;
  /** Undecoded shadow-data query for diagnostics */
  rawQuery(): Promise<HttpResponse>;
}
