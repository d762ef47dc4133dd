/**
 * Common type definitions used throughout the project
 */

/**
 * Furnace blower mode as reported by the thermostat
 * AUTO follows the burner, CIRCULATE runs periodically, ON runs continuously
 */
export type BlowerMode = 'AUTO' | 'CIRCULATE' | 'ON';

/**
 * Ceiling fan speed step (device-defined, 0 = off)
 */
export type FanSpeed = number;

/**
 * Monotonic-enough time source returning milliseconds
 */
export type Clock = () => number;

/**
 * One decoded thermostat state, replaced wholesale on each successful poll
 */
export interface ThermostatReading {
  /** Room temperature in device units */
  readonly temperature: number;
  /** Heating setpoint in device units */
  readonly targetTemperature: number;
  /** True while the thermostat is calling for heat */
  readonly heatCallActive: boolean;
  /** Blower mode the thermostat reports */
  readonly blowerMode: BlowerMode;
}
