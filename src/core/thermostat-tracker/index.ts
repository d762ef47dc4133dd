export { createThermostatTracker } from './thermostat-tracker';
export type { TrackerDependencies } from './thermostat-tracker';
export {
  calculateTimeSinceTransition,
  detectTransition,
  formatStatusLine,
  getFailureDetails,
  shouldReportFailure
} from './helpers';
export type { FailureDetails, PollResult, ThermostatTracker, TrackerConfig, TrackerState } from './types';
