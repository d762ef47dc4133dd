export { createHttpTransport } from './http-transport';
export { sendCommand, assertCommandOk, describeCommand } from './helpers';
export type {
  CommandPayload,
  CommandResult,
  DeviceTransport,
  FetchFn,
  HttpResponse,
  TransportConfig
} from './types';
