/**
 * Thermostat device type definitions
 */

import type { BlowerMode, ThermostatReading } from '$types/common';
import type { CommandResult, HttpResponse } from '../transport';

/**
 * Thermostat client
 */
export interface ThermostatDevice {
  /** Thermostat URL */
  readonly url: string;
  /**
   * Read and decode the current state
   * Rejects with TransportError, HttpStatusError or ParseError
   */
  read(): Promise<ThermostatReading>;
  /** Set the blower mode; rejects with TransportError when unreachable */
  setBlowerMode(mode: BlowerMode): Promise<CommandResult>;
  /** Undecoded read for diagnostics */
  rawRead(): Promise<HttpResponse>;
}
