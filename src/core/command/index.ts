export { executeCommand } from './command';
export type { CommandRequest } from './types';
