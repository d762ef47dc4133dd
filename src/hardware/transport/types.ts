/**
 * Device transport type definitions
 */

/**
 * JSON body sent with a device command
 */
export type CommandPayload = Readonly<Record<string, number>>;

/**
 * Raw response from a device
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Response body as text */
  body: string;
}

/**
 * Outcome of a device command
 */
export interface CommandResult extends HttpResponse {
  /** True when the device answered 200 */
  ok: boolean;
  /** Round-trip time in milliseconds */
  elapsedMs: number;
}

/**
 * Request/response exchange against one fixed device URL
 *
 * Both methods reject with a TransportError when no response arrives
 * (connection refused, timeout, aborted body).
 */
export interface DeviceTransport {
  /** Device URL every request goes to */
  readonly url: string;
  /** Issue a GET */
  get(): Promise<HttpResponse>;
  /** Issue a POST with a JSON body */
  post(payload: CommandPayload): Promise<HttpResponse>;
}

/**
 * Transport configuration
 */
export interface TransportConfig {
  /** Device URL */
  url: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Fetch implementation (global fetch in production)
 */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;
