import { APP_CONSTANTS } from '@boot/config';
import { createHealthMonitor } from './sensor-health';
import { checkVoltageStability, calculateStabilityScore, resolveHealthState, measureDrift } from './helpers';

describe('sensor-health', () => {
  let clockSec: number;
  const clock = () => clockSec;

  beforeEach(() => {
    clockSec = 0;
  });

  describe('createHealthMonitor', () => {
    it('should start healthy with a neutral stability score', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);

      expect(health.check()).toEqual({
        status: 'healthy',
        issues: [],
        stabilityScore: 50,
        consecutiveErrors: 0
      });
      expect(health.lastVoltage()).toBe(0);
    });

    it('should report a stuck sensor after 20 readings with 2 distinct values', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 20; i++) {
        health.record(1.5, i % 2 === 0 ? 30000 : 30001);
      }

      expect(health.check()).toEqual({
        status: 'degraded',
        issues: ['Sensor appears stuck: only 2 unique values in 20 readings'],
        stabilityScore: 100,
        consecutiveErrors: 0
      });
    });

    it('should not judge stuckness before the window is full', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 19; i++) {
        health.record(1.5, 30000);
      }

      expect(health.check().issues).toEqual([]);
    });

    it('should return the same status when checked twice without new samples', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 20; i++) {
        health.record(1.5, 30000);
      }

      const first = health.check();
      const second = health.check();

      expect(second).toEqual(first);
      expect(health.lastStatus()).toEqual(first);
    });

    it('should fail on an error streak above the limit', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 5; i++) {
        health.recordError();
      }
      expect(health.check().status).toBe('healthy');

      health.recordError();
      expect(health.check()).toEqual({
        status: 'failed',
        issues: ['Consecutive read errors: 6'],
        stabilityScore: 50,
        consecutiveErrors: 6
      });
    });

    it('should recover from failed once a read succeeds and no issue remains', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 6; i++) {
        health.recordError();
      }
      health.check();

      health.record(1.2, 24000);

      expect(health.check().status).toBe('healthy');
    });

    it('should keep degraded after the issue clears', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 20; i++) {
        health.record(1.5, 30000);
      }
      health.check();
      for (let i = 0; i < 20; i++) {
        health.record(1.5, 30000 + i);
      }

      const status = health.check();

      expect(status.issues).toEqual([]);
      expect(status.status).toBe('degraded');
    });

    it('should report unstable voltage', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 10; i++) {
        health.record(i % 2 === 0 ? 1.0 : 1.6, 30000 + i);
      }

      const status = health.check();

      expect(status.issues).toEqual(['Unstable voltage: 0.600V range']);
      expect(status.stabilityScore).toBe(40);
      expect(health.lastVoltage()).toBe(1.6);
    });

    it('should report calibration drift against samples older than 23 hours', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 50; i++) {
        clockSec = i;
        health.record(1.0, 30000 + i);
      }

      clockSec = 90000;
      expect(health.check().issues).toEqual([]);

      for (let i = 0; i < 5; i++) {
        health.record(1.5, 20000 + i);
      }
      const status = health.check();

      expect(status.issues).toEqual(['Possible calibration drift: 0.500V change in 24h']);
      expect(status.status).toBe('degraded');
      expect(health.check()).toEqual(status);
    });

    it('should not compare drift before a day has passed', () => {
      const health = createHealthMonitor(APP_CONSTANTS, clock);
      for (let i = 0; i < 50; i++) {
        clockSec = i;
        health.record(1.0, 30000 + i);
      }
      clockSec = 86000;
      for (let i = 0; i < 5; i++) {
        health.record(1.5, 20000 + i);
      }

      expect(health.check().issues).toEqual([]);
    });
  });

  describe('checkVoltageStability', () => {
    it('should need a full window', () => {
      expect(checkVoltageStability([0.01, 0.01], APP_CONSTANTS)).toBeNull();
    });

    it('should flag low and high averages', () => {
      expect(checkVoltageStability(new Array<number>(10).fill(0.05), APP_CONSTANTS))
        .toBe('Voltage too low - possible disconnection');
      expect(checkVoltageStability(new Array<number>(10).fill(3.3), APP_CONSTANTS))
        .toBe('Voltage too high - possible short circuit');
    });
  });

  describe('calculateStabilityScore', () => {
    it('should floor at 0 for a wide spread', () => {
      expect(calculateStabilityScore([0, 2, 0, 2, 0], APP_CONSTANTS)).toBe(0);
    });

    it('should use only the newest 20 voltages', () => {
      const voltages = [3.0].concat(new Array<number>(20).fill(1.0));
      expect(calculateStabilityScore(voltages, APP_CONSTANTS)).toBe(100);
    });
  });

  describe('measureDrift', () => {
    it('should return null when a window is short', () => {
      const samples = [
        { timestamp: 0, value: 1 },
        { timestamp: 90000, value: 2 }
      ];
      expect(measureDrift(samples, 90000, APP_CONSTANTS)).toBeNull();
    });
  });

  describe('resolveHealthState', () => {
    it('should apply the transition rules', () => {
      expect(resolveHealthState('healthy', 0, false)).toBe('healthy');
      expect(resolveHealthState('healthy', 1, false)).toBe('degraded');
      expect(resolveHealthState('failed', 0, false)).toBe('healthy');
      expect(resolveHealthState('degraded', 0, false)).toBe('degraded');
      expect(resolveHealthState('healthy', 1, true)).toBe('failed');
      expect(resolveHealthState('failed', 2, false)).toBe('failed');
    });
  });
});
