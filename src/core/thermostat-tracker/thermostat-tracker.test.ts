/**
 * Unit tests for the thermostat state tracker
 */

import type { Mock } from 'vitest';
import type { ThermostatReading } from '$types/common';
import { HttpStatusError, ParseError, TransportError } from '$types/errors';
import type { InitMessage, LogLevel } from '@logging';
import type { ThermostatDevice } from '@hardware/thermostat';
import { createThermostatTracker } from './thermostat-tracker';

const URL_UNDER_TEST = 'http://tstat.test/tstat';
const CONFIG = { BLOWER_TAIL_SEC: 360, FAILURE_REPORT_INTERVAL: 6 };

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

function reading(heatCallActive: boolean, overrides: Partial<ThermostatReading> = {}): ThermostatReading {
  return { temperature: 68.5, targetTemperature: 70, heatCallActive: heatCallActive, blowerMode: 'AUTO', ...overrides };
}

describe('createThermostatTracker', () => {
  let now: number;
  let logger: ReturnType<typeof createMockLogger>;
  let read: Mock<() => Promise<ThermostatReading>>;
  let device: ThermostatDevice;

  beforeEach(() => {
    now = 1_000_000;
    logger = createMockLogger();
    read = vi.fn<() => Promise<ThermostatReading>>();
    device = {
      url: URL_UNDER_TEST,
      read: read,
      setBlowerMode: vi.fn(),
      rawRead: vi.fn()
    };
  });

  function createTracker() {
    return createThermostatTracker(device, CONFIG, { clock: () => now, logger: logger });
  }

  describe('before the first reading', () => {
    it('should report no heat call and no blower mode', () => {
      const tracker = createTracker();

      expect(tracker.isHeatCallActive()).toBe(false);
      expect(tracker.blowerMode()).toBeNull();
      expect(tracker.currentReading()).toBeNull();
      expect(tracker.transitionedThisPoll()).toBe(false);
    });

    it('should report the tail window as time since transition', () => {
      expect(createTracker().timeSinceTransitionMs()).toBe(360000);
    });

    it('should describe the missing reading', () => {
      expect(createTracker().describe()).toBe('State: no reading | Time since transition: 360s');
    });
  });

  describe('successful polls', () => {
    it('should store the reading without flagging a transition on the first poll', async () => {
      read.mockResolvedValueOnce(reading(true));
      const tracker = createTracker();

      const result = await tracker.poll();

      expect(result).toEqual({ ok: true, reading: reading(true) });
      expect(tracker.transitionedThisPoll()).toBe(false);
      expect(tracker.isHeatCallActive()).toBe(true);
      expect(tracker.blowerMode()).toBe('AUTO');
      expect(tracker.getState().lastTransitionAt).toBeNull();
    });

    it('should flag a transition only on the poll where the heat call flips', async () => {
      read
        .mockResolvedValueOnce(reading(false))
        .mockResolvedValueOnce(reading(true))
        .mockResolvedValueOnce(reading(true, { temperature: 69 }));
      const tracker = createTracker();

      await tracker.poll();
      expect(tracker.transitionedThisPoll()).toBe(false);

      now += 15000;
      await tracker.poll();
      expect(tracker.transitionedThisPoll()).toBe(true);
      expect(tracker.getState().lastTransitionAt).toBe(1_015_000);
      expect(logger.info).toHaveBeenCalledWith('Heat call started');

      now += 15000;
      await tracker.poll();
      expect(tracker.transitionedThisPoll()).toBe(false);
      expect(tracker.timeSinceTransitionMs()).toBe(15000);
    });

    it('should describe the current state', async () => {
      read.mockResolvedValueOnce(reading(false)).mockResolvedValueOnce(reading(true));
      const tracker = createTracker();

      await tracker.poll();
      await tracker.poll();
      now += 42000;

      expect(tracker.describe()).toBe('State: Temp: 68.5 Target: 70 Heat On: true Blower: AUTO | Time since transition: 42s');
    });
  });

  describe('failed polls', () => {
    it('should clear the transition flag and keep the last reading', async () => {
      read
        .mockResolvedValueOnce(reading(false))
        .mockResolvedValueOnce(reading(true))
        .mockRejectedValueOnce(new HttpStatusError(URL_UNDER_TEST, 500, 'busy'));
      const tracker = createTracker();

      await tracker.poll();
      await tracker.poll();
      expect(tracker.transitionedThisPoll()).toBe(true);

      const result = await tracker.poll();

      expect(result.ok).toBe(false);
      expect(tracker.transitionedThisPoll()).toBe(false);
      expect(tracker.currentReading()).toEqual(reading(true));
      expect(tracker.consecutiveFailures()).toBe(1);
    });

    it('should log one CRITICAL entry after six HTTP 500s and keep the reading frozen', async () => {
      read.mockResolvedValueOnce(reading(true));
      const tracker = createTracker();
      await tracker.poll();

      read.mockRejectedValue(new HttpStatusError(URL_UNDER_TEST, 500, 'busy'));
      for (let i = 0; i < 6; i++) {
        await tracker.poll();
      }

      expect(logger.critical).toHaveBeenCalledTimes(1);
      expect(logger.critical).toHaveBeenCalledWith(
        'Thermostat http://tstat.test/tstat failed to get data 6 attempts. Returned code: 500, response: busy'
      );
      expect(logger.info).toHaveBeenCalledTimes(6);
      expect(logger.info).toHaveBeenLastCalledWith(
        'Thermostat read failed (6 in a row): HTTP 500 from http://tstat.test/tstat'
      );
      expect(tracker.currentReading()).toEqual(reading(true));
      expect(tracker.consecutiveFailures()).toBe(6);
    });

    it('should report again on the twelfth failure', async () => {
      read.mockRejectedValue(new TransportError('Request timeout after 10000ms', URL_UNDER_TEST));
      const tracker = createTracker();

      for (let i = 0; i < 12; i++) {
        await tracker.poll();
      }

      expect(logger.critical).toHaveBeenCalledTimes(2);
      expect(logger.critical).toHaveBeenLastCalledWith(
        'Thermostat http://tstat.test/tstat failed to get data 12 attempts. Returned code: none, response: Request timeout after 10000ms'
      );
    });

    it('should reset the failure count on success', async () => {
      read
        .mockRejectedValueOnce(new ParseError('Empty thermostat data returned', URL_UNDER_TEST, ''))
        .mockRejectedValueOnce(new ParseError('Empty thermostat data returned', URL_UNDER_TEST, ''))
        .mockResolvedValueOnce(reading(false));
      const tracker = createTracker();

      await tracker.poll();
      await tracker.poll();
      expect(tracker.consecutiveFailures()).toBe(2);

      await tracker.poll();
      expect(tracker.consecutiveFailures()).toBe(0);
    });

    it('should let errors that are not device errors propagate', async () => {
      read.mockRejectedValueOnce(new TypeError('bug'));
      const tracker = createTracker();

      await expect(tracker.poll()).rejects.toThrow('bug');
    });
  });
});
