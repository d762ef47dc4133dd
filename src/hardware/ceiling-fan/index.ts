export { createCeilingFanDevice } from './ceiling-fan-device';
export { decodeFanSpeed } from './helpers';
export { FanShadowSchema } from './schemas';
export type { CeilingFanDevice } from './types';
