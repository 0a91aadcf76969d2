import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { InitializationError } from '$types';
import type { ConsoleAPI } from '@logging';
import type { SleepFn } from '@utils/time';
import { initialize } from './init';
import type { Engine, InitOptions } from './types';

describe('initialize', () => {
  let dir: string;
  let configPath: string;
  let lines: string[];
  let consoleApi: ConsoleAPI;
  let engine: Engine | null;

  const instantSleep: SleepFn = async () => true;

  function options(overrides: Partial<InitOptions> = {}): InitOptions {
    return {
      configPath: configPath,
      env: { MONITOR_DATABASE_PATH: ':memory:', SLACK_BOT_TOKEN: 'test-token' },
      consoleApi: consoleApi,
      fetchApi: async () => new Response(JSON.stringify({ ok: true }), { status: 200 }),
      sleep: instantSleep,
      ...overrides
    };
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'leak-monitor-init-'));
    configPath = join(dir, 'config.json');
    writeFileSync(configPath, JSON.stringify({
      ADC_DRIVER: 'simulated',
      SIMULATED_REFERENCE_RAW: 20000,
      SIMULATED_CONTROL_RAW: 50000,
      SIMULATED_NOISE_RAW: 0,
      LOG_FILE_PATH: ''
    }), 'utf8');
    lines = [];
    consoleApi = {
      log: (message) => {
        lines.push(message);
      },
      warn: (message) => {
        lines.push(message);
      }
    };
    engine = null;
  });

  afterEach(async () => {
    if (engine !== null) {
      await engine.shutdown();
    }
    rmSync(dir, { recursive: true, force: true });
  });

  it('should build an engine that detects a leak on the simulated converter', async () => {
    engine = await initialize(options());

    expect(await engine.monitor.initialize()).toBe(true);
    for (let i = 0; i < 3; i++) {
      await engine.monitor.runCycle();
    }

    const alerts = engine.store.getActiveAlerts();
    expect(alerts).toHaveLength(1);
    expect(alerts[0].difference).toBe(100);
    expect(engine.store.getReadings(1)).toHaveLength(3);
  });

  it('should log the startup banner without colours', async () => {
    engine = await initialize(options());

    expect(lines.some((line) => line.endsWith('ℹ️ [INFO]     💧 Water leak monitor starting'))).toBe(true);
    expect(lines.join('\n')).not.toContain('\u001b[');
  });

  it('should log config warnings through the logger', async () => {
    writeFileSync(configPath, JSON.stringify({ ADC_DRIVER: 'simulated', LOG_FILE_PATH: '', SAMPLE_INTERVAL_SEC: 5 }), 'utf8');

    engine = await initialize(options());

    expect(engine.config.SAMPLE_INTERVAL_SEC).toBe(60);
    expect(lines.some((line) => line.endsWith(
      '⚠️ [WARNING]  [SAMPLE_INTERVAL_SEC]: SAMPLE_INTERVAL_SEC must be between 30 and 600 (got 5), using default'
    ))).toBe(true);
  });

  it('should stay degraded when the converter cannot be opened', async () => {
    engine = await initialize(options({
      openReader: async () => {
        throw new Error('i2c bus 1 not available');
      }
    }));

    expect(await engine.monitor.initialize()).toBe(false);
    expect(engine.monitor.start()).toBe(false);
    expect(engine.monitor.status().sensorsInitialized).toBe(false);
  });

  it('should reconfigure Slack and save the file when settings change', async () => {
    engine = await initialize(options());
    expect(engine.notifier.isEnabled()).toBe(false);

    const result = engine.monitor.updateSettings({ SLACK_ENABLED: true, SLACK_CHANNEL: 'leaks' });

    expect(result.ok).toBe(true);
    expect(engine.notifier.isEnabled()).toBe(true);
    const saved: unknown = JSON.parse(readFileSync(configPath, 'utf8'));
    expect(saved).toEqual(expect.objectContaining({ SLACK_ENABLED: true, SLACK_CHANNEL: '#leaks', DATABASE_PATH: 'readings.db' }));
  });

  it('should lower the log level with debug', async () => {
    engine = await initialize(options({ debug: true }));

    expect(engine.logger.getLevel()).toBe(0);
    expect(engine.config.GLOBAL_LOG_LEVEL).toBe(1);
  });

  it('should fail when the database cannot be opened', async () => {
    const blocked = join(configPath, 'readings.db');

    await expect(initialize(options({ env: { MONITOR_DATABASE_PATH: blocked } })))
      .rejects.toBeInstanceOf(InitializationError);
  });
});
