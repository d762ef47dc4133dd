export { createThermostatDevice } from './thermostat-device';
export { blowerModeFromCode, blowerModeToCode, decodeThermostatReading, formatReading, readingFromState } from './helpers';
export { ThermostatStateSchema } from './schemas';
export type { ThermostatStateResponse } from './schemas';
export type { ThermostatDevice } from './types';
