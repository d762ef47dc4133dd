export { now, nowMs, sleep } from './time';
export { calculateSleepMs, secToMs, msToWholeSec } from './helpers';
