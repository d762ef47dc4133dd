/**
 * Core control logic
 *
 * - thermostat-tracker: Poll the thermostat and track heat-call transitions
 * - fan-sync: Debounced ceiling fan speed changes
 * - blower-override: Furnace blower tail run with latch and restore
 * - command: Send a device command and log its outcome
 */

export * from './thermostat-tracker';
export * from './fan-sync';
export * from './blower-override';
export * from './command';
export type { ControlledFan, DiagnosticReport, TrackerView } from './types';
