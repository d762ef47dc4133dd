export { run, runControlLoop } from './control';
export { formatCrash, updateFans } from './helpers';
export type { Controller, LoopDependencies } from './types';
