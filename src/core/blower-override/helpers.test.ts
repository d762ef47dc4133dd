/**
 * Unit tests for blower override decisions
 */

import { decideBlowerOverride, isTailWindowActive } from './helpers';
import type { BlowerInputs } from './types';

const CONFIG = { BLOWER_TAIL_SEC: 360 };

function inputs(overrides: Partial<BlowerInputs>): BlowerInputs {
  return { transitioned: false, heatCallActive: false, timeSinceTransitionMs: 0, currentMode: 'AUTO', ...overrides };
}

describe('isTailWindowActive', () => {
  it('should be inactive while heating', () => {
    expect(isTailWindowActive(inputs({ heatCallActive: true, timeSinceTransitionMs: 10 }), CONFIG)).toBe(false);
  });

  it('should be active on the poll where heat ended', () => {
    expect(isTailWindowActive(inputs({ transitioned: true, timeSinceTransitionMs: 0 }), CONFIG)).toBe(true);
  });

  it('should be active inside the window and over exactly at the boundary', () => {
    expect(isTailWindowActive(inputs({ timeSinceTransitionMs: 359999 }), CONFIG)).toBe(true);
    expect(isTailWindowActive(inputs({ timeSinceTransitionMs: 360000 }), CONFIG)).toBe(false);
  });
});

describe('decideBlowerOverride', () => {
  describe('inside the tail window', () => {
    it('should latch the reported mode and command ON', () => {
      const decision = decideBlowerOverride(inputs({ transitioned: true }), { latchedMode: null }, CONFIG);
      expect(decision).toEqual({ latch: 'AUTO', clearLatch: false, command: 'ON' });
    });

    it('should not re-latch once a mode is held', () => {
      const decision = decideBlowerOverride(inputs({ timeSinceTransitionMs: 15000 }), { latchedMode: 'CIRCULATE' }, CONFIG);
      expect(decision).toEqual({ latch: null, clearLatch: false, command: 'ON' });
    });

    it('should send nothing once the blower reports ON', () => {
      const decision = decideBlowerOverride(inputs({ timeSinceTransitionMs: 15000, currentMode: 'ON' }), { latchedMode: 'AUTO' }, CONFIG);
      expect(decision).toEqual({ latch: null, clearLatch: false, command: null });
    });

    it('should latch ON when the blower was already ON', () => {
      const decision = decideBlowerOverride(inputs({ transitioned: true, currentMode: 'ON' }), { latchedMode: null }, CONFIG);
      expect(decision).toEqual({ latch: 'ON', clearLatch: false, command: null });
    });
  });

  describe('outside the tail window', () => {
    it('should do nothing without a latch', () => {
      const decision = decideBlowerOverride(inputs({ timeSinceTransitionMs: 400000, currentMode: 'ON' }), { latchedMode: null }, CONFIG);
      expect(decision).toEqual({ latch: null, clearLatch: false, command: null });
    });

    it('should restore the latched mode while the device still reports ON', () => {
      const decision = decideBlowerOverride(inputs({ timeSinceTransitionMs: 360000, currentMode: 'ON' }), { latchedMode: 'AUTO' }, CONFIG);
      expect(decision).toEqual({ latch: null, clearLatch: false, command: 'AUTO' });
    });

    it('should release the latch once the device reports the latched mode', () => {
      const decision = decideBlowerOverride(inputs({ timeSinceTransitionMs: 375000, currentMode: 'AUTO' }), { latchedMode: 'AUTO' }, CONFIG);
      expect(decision).toEqual({ latch: null, clearLatch: true, command: null });
    });

    it('should restore immediately when heat resumes inside the window', () => {
      const decision = decideBlowerOverride(
        inputs({ transitioned: true, heatCallActive: true, timeSinceTransitionMs: 0, currentMode: 'ON' }),
        { latchedMode: 'AUTO' },
        CONFIG
      );
      expect(decision).toEqual({ latch: null, clearLatch: false, command: 'AUTO' });
    });
  });
});
