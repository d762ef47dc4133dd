export { createCeilingFanSync } from './fan-sync';
export type { CeilingFanSync } from './fan-sync';
export { decideFanSync, getSettleDelayMs } from './helpers';
export type { FanSyncConfig, FanSyncDecision, FanSyncInputs, FanSyncState } from './types';
