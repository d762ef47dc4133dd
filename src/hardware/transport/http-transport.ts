/**
 * HTTP device transport
 * Fetch-based request/response exchange with a fixed per-call timeout
 */

import { TransportError } from '$types/errors';
import type { CommandPayload, DeviceTransport, FetchFn, HttpResponse, TransportConfig } from './types';

const JSON_HEADERS = {
  'Content-Type': 'application/json',
  'charset': 'utf-8'
} as const;

/**
 * Describe why a request produced no response
 * @param err - Rejection from fetch or from reading the body
 * @param timeoutMs - Configured timeout
 */
function describeFailure(err: unknown, timeoutMs: number): string {
  if (typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError') {
    return 'Request timeout after ' + timeoutMs + 'ms';
  }
  return 'Request failed: ' + (err instanceof Error ? err.message : String(err));
}

/**
 * Create a transport bound to one device URL
 *
 * The transport is created once per device and reused for every request.
 * Redirects are followed. The timeout covers the whole exchange, body included.
 *
 * @param config - URL and timeout
 * @param fetchFn - Fetch implementation
 * @returns Device transport
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({ url: 'http://192.168.0.73/tstat', timeoutMs: 10000 });
 * const response = await transport.get();
 * ```
 */
export function createHttpTransport(config: TransportConfig, fetchFn: FetchFn = fetch): DeviceTransport {
  const url = config.url;
  const timeoutMs = config.timeoutMs;

  async function request(init: RequestInit): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchFn(url, {
        ...init,
        headers: JSON_HEADERS,
        redirect: 'follow',
        signal: controller.signal
      });
      const body = await response.text();
      return { status: response.status, body: body };
    } catch (err) {
      throw new TransportError(describeFailure(err, timeoutMs), url, err);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  function get(): Promise<HttpResponse> {
    return request({ method: 'GET' });
  }

  function post(payload: CommandPayload): Promise<HttpResponse> {
    return request({ method: 'POST', body: JSON.stringify(payload) });
  }

  return {
    url: url,
    get: get,
    post: post
  };
}
