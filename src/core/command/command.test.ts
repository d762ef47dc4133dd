/**
 * Unit tests for device command execution
 */

import { TransportError } from '$types/errors';
import type { InitMessage, LogLevel } from '@logging';
import type { CommandResult } from '@hardware/transport';
import { executeCommand } from './command';

const URL_UNDER_TEST = 'http://fan.test/mf';

function createMockLogger() {
  return {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    critical: vi.fn(),
    setLevel: vi.fn(),
    getLevel: vi.fn((): LogLevel => 1),
    initialize: vi.fn((): InitMessage[] => [])
  };
}

function request(send: () => Promise<CommandResult>) {
  return {
    url: URL_UNDER_TEST,
    description: 'Set fan speed to 2',
    command: 'fanSpeed=2',
    send: send
  };
}

describe('executeCommand', () => {
  it('should log success at INFO with status and elapsed time', async () => {
    const logger = createMockLogger();

    const ok = await executeCommand(
      request(() => Promise.resolve({ ok: true, status: 200, body: '{}', elapsedMs: 37 })),
      logger
    );

    expect(ok).toBe(true);
    expect(logger.info).toHaveBeenCalledWith('Set fan speed to 2 on http://fan.test/mf: HTTP 200 (37 ms)');
    expect(logger.warning).not.toHaveBeenCalled();
  });

  it('should log a rejected command at WARNING with the response body', async () => {
    const logger = createMockLogger();

    const ok = await executeCommand(
      request(() => Promise.resolve({ ok: false, status: 500, body: 'busy', elapsedMs: 12 })),
      logger
    );

    expect(ok).toBe(false);
    expect(logger.warning).toHaveBeenCalledWith(
      'Set fan speed to 2 failed: fanSpeed=2 rejected by http://fan.test/mf with HTTP 500, response: busy (12 ms)'
    );
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('should log an unreachable device at WARNING', async () => {
    const logger = createMockLogger();

    const ok = await executeCommand(
      request(() => Promise.reject(new TransportError('Request timeout after 10000ms', URL_UNDER_TEST))),
      logger
    );

    expect(ok).toBe(false);
    expect(logger.warning).toHaveBeenCalledWith(
      'Set fan speed to 2 on http://fan.test/mf failed: Request timeout after 10000ms'
    );
  });

  it('should rethrow unexpected errors', async () => {
    const logger = createMockLogger();

    await expect(executeCommand(request(() => Promise.reject(new TypeError('bug'))), logger)).rejects.toThrow('bug');
  });
});
