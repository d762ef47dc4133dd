export { createBlowerOverride } from './blower-override';
export type { BlowerOverride } from './blower-override';
export { decideBlowerOverride, isTailWindowActive } from './helpers';
export type { BlowerDecision, BlowerInputs, BlowerLatchState, BlowerOverrideConfig } from './types';
