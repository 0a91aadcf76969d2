/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, fmtPercent, fmtVolts, toLogLevel, createNodeTimerApi } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  it('should tag each level', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'msg', LOG_LEVELS)).toBe('[DEBUG]    msg');
    expect(formatLogMessage(LOG_LEVELS.INFO, 'msg', LOG_LEVELS)).toBe('ℹ️ [INFO]     msg');
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'msg', LOG_LEVELS)).toBe('⚠️ [WARNING]  msg');
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'msg', LOG_LEVELS)).toBe('🚨 [CRITICAL] msg');
  });

  it('should keep an empty message', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS)).toBe('ℹ️ [INFO]     ');
  });
});

describe('shouldLog', () => {
  describe('basic level filtering', () => {
    it('should log when level equals current log level', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });

    it('should not log when level below current log level', () => {
      expect(shouldLog(LOG_LEVELS.DEBUG, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(false);
    });

    it('should log when level above current log level', () => {
      expect(shouldLog(LOG_LEVELS.CRITICAL, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });
  });

  describe('auto-demotion of INFO logs', () => {
    it('should demote INFO logs after uptime threshold', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 24 * 3600 + 1, demoteHours: 24 }, LOG_LEVELS)).toBe(false);
    });

    it('should not demote INFO logs at the threshold itself', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 24 * 3600, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });

    it('should never demote in DEBUG mode', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.DEBUG, uptime: 100 * 3600, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });

    it('should not demote when demoteHours is 0', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 100 * 3600, demoteHours: 0 }, LOG_LEVELS)).toBe(true);
    });

    it('should never demote WARNING', () => {
      expect(shouldLog(LOG_LEVELS.WARNING, { currentLevel: LOG_LEVELS.INFO, uptime: 100 * 3600, demoteHours: 1 }, LOG_LEVELS)).toBe(true);
    });
  });
});

describe('fmtPercent', () => {
  it('should format with one decimal', () => {
    expect(fmtPercent(42.46)).toBe('42.5%');
    expect(fmtPercent(0)).toBe('0.0%');
    expect(fmtPercent(100)).toBe('100.0%');
  });

  it('should show n/a for null', () => {
    expect(fmtPercent(null)).toBe('n/a');
  });
});

describe('fmtVolts', () => {
  it('should format with three decimals', () => {
    expect(fmtVolts(1.5)).toBe('1.500V');
    expect(fmtVolts(0.0125)).toBe('0.013V');
  });
});

describe('toLogLevel', () => {
  it('should accept 0..3', () => {
    expect(toLogLevel(0, 1)).toBe(0);
    expect(toLogLevel(3, 1)).toBe(3);
  });

  it('should fall back for anything else', () => {
    expect(toLogLevel(7, 1)).toBe(1);
    expect(toLogLevel(1.5, 2)).toBe(2);
  });
});

describe('createNodeTimerApi', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fire a callback after its delay', () => {
    const timer = createNodeTimerApi();
    const callback = vi.fn();

    timer.set(1000, callback);
    vi.advanceTimersByTime(999);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should cancel pending callbacks on clearAll', () => {
    const timer = createNodeTimerApi();
    const callback = vi.fn();

    timer.set(1000, callback);
    timer.set(2000, callback);
    timer.clearAll();
    vi.advanceTimersByTime(5000);

    expect(callback).not.toHaveBeenCalled();
  });
});
