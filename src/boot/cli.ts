/**
 * Command-line program
 *
 * Every command builds its own engine, does one thing and shuts the engine
 * down again; only `run` keeps it alive until a stop signal arrives.
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import { Command } from 'commander';

import { InitializationError, SettingsValidationError, ValidationError } from '$types';
import { parseSettingAssignments } from '@validation';
import {
  formatAlertLine,
  formatHistoryRow,
  formatReadingLines,
  formatSettingsLines,
  formatStatisticsLines,
  formatStatusLines,
  parseAlertId,
  parseCalibrationPoint,
  parseHours,
  parsePercentage,
  parseSensorId,
  HISTORY_ROW_LIMIT
} from './cli-helpers';
import type { Engine, InitOptions } from './types';

export interface CliDependencies {
  initialize: (options: InitOptions) => Promise<Engine>;
  /** Resolves with the signal name once the process should stop */
  waitForStop: () => Promise<string>;
  out?: (line: string) => void;
  paint?: ChalkInstance;
}

type GlobalOptions = {
  config: string;
  envFile: string;
  debug?: boolean;
};

const RULE_WIDTH = 60;

export function createProgram(deps: CliDependencies): Command {
  const out = deps.out ?? function(line: string) {
    console.log(line);
  };
  const paint = deps.paint ?? chalk;

  function heading(title: string): void {
    out(paint.cyan('═'.repeat(RULE_WIDTH)));
    out(paint.cyan.bold(title));
    out(paint.cyan('═'.repeat(RULE_WIDTH)));
  }

  async function openEngine(command: Command): Promise<Engine> {
    const options = command.optsWithGlobals<GlobalOptions>();
    return deps.initialize({
      configPath: options.config,
      envFile: options.envFile,
      debug: options.debug === true
    });
  }

  /**
   * Run an action against a fresh engine and always shut it down afterwards
   */
  async function withEngine(
    command: Command,
    needsSensors: boolean,
    action: (engine: Engine) => Promise<void> | void
  ): Promise<void> {
    const engine = await openEngine(command);
    try {
      if (needsSensors) {
        const init = await engine.sensors.initialize();
        if (!init.ok) throw new InitializationError(init.error);
      }
      await action(engine);
    } finally {
      await engine.shutdown();
    }
  }

  const program = new Command();

  program
    .name('leak-monitor')
    .description('Dual-sensor water leak monitor')
    .option('-c, --config <path>', 'JSON config file', 'config.json')
    .option('--env-file <path>', 'dotenv file with secrets', '.env')
    .option('-d, --debug', 'log at DEBUG level to the console');

  program
    .command('run')
    .description('start the monitoring loop until interrupted')
    .action(async function(_options: object, command: Command) {
      const engine = await openEngine(command);
      await engine.monitor.initialize();
      if (!engine.monitor.start()) {
        await engine.shutdown();
        throw new InitializationError('Sensors unavailable, monitoring not started');
      }
      out(paint.green('● Monitoring every ' + engine.config.SAMPLE_INTERVAL_SEC + 's (Ctrl+C to stop)'));
      const signal = await deps.waitForStop();
      engine.logger.info('Received ' + signal + ', shutting down');
      await engine.shutdown();
      out(paint.gray('○ Stopped'));
    });

  program
    .command('reading')
    .description('take one reading from both sensors')
    .action(async function(_options: object, command: Command) {
      await withEngine(command, true, async function(engine) {
        const reading = await engine.monitor.currentReading();
        if (!reading.ok) throw new InitializationError(reading.error);
        heading('Current reading');
        const lines = formatReadingLines(reading.value);
        for (const line of lines) out(line);
        if (reading.value.status === 'leak_detected') {
          out(paint.red.bold('Difference above the status threshold'));
        }
      });
    });

  program
    .command('status')
    .description('show sensor health, leak state and settings')
    .action(async function(_options: object, command: Command) {
      await withEngine(command, true, function(engine) {
        const status = engine.monitor.status();
        heading('Monitor status');
        for (const line of formatStatusLines(status)) out(line);
        if (status.systemHealth !== null) {
          for (const id of ['reference', 'control'] as const) {
            const health = status.systemHealth[id];
            const issues = health.issues.length > 0 ? health.issues.join('; ') : 'no issues';
            const line = '  ' + id + ': ' + health.status + ' (stability ' + health.stabilityScore + ') ' + issues;
            out(health.status === 'healthy' ? paint.green(line) : paint.yellow(line));
          }
        }
        out(paint.gray('─'.repeat(40)));
        for (const line of formatSettingsLines(status.settings)) out(line);
      });
    });

  program
    .command('calibrate <sensor>')
    .description('record the current raw value as the empty or full endpoint')
    .option('--empty', 'sensor is in an empty tank')
    .option('--full', 'sensor is in a full tank')
    .action(async function(sensor: string, flags: { empty?: boolean; full?: boolean }, command: Command) {
      const id = parseSensorId(sensor);
      const point = parseCalibrationPoint(flags);
      await withEngine(command, true, async function(engine) {
        const result = await engine.monitor.calibrate(id, point);
        if (!result.ok) throw new InitializationError(result.error);
        out(paint.green('✓ ' + id + ' ' + point + ' point set to raw ' + result.value.rawValue));
      });
    });

  program
    .command('tare <sensor>')
    .description('re-zero a sensor at its current level')
    .option('-t, --target <percent>', 'level the sensor is actually at', '0')
    .action(async function(sensor: string, flags: { target: string }, command: Command) {
      const id = parseSensorId(sensor);
      const target = parsePercentage(flags.target);
      await withEngine(command, true, async function(engine) {
        const result = await engine.monitor.tare(id, target);
        if (!result.ok) throw new InitializationError(result.error);
        out(paint.green('✓ ' + id + ' empty point moved from ' + result.value.oldEmpty + ' to ' + result.value.newEmpty));
      });
    });

  program
    .command('settings')
    .description('show or change the runtime settings')
    .option('-s, --set <assignment...>', 'KEY=value pairs to apply')
    .action(async function(flags: { set?: string[] }, command: Command) {
      const assignments = flags.set ?? [];
      const parsed = parseSettingAssignments(assignments);
      if (!parsed.ok) {
        throw new SettingsValidationError(parsed.error, []);
      }
      await withEngine(command, false, function(engine) {
        if (assignments.length > 0) {
          const updated = engine.monitor.updateSettings(parsed.value);
          if (!updated.ok) {
            throw new SettingsValidationError(updated.error, Object.keys(parsed.value));
          }
          out(paint.green('✓ Saved to ' + engine.configStore.path));
        }
        for (const line of formatSettingsLines(engine.monitor.status().settings)) out(line);
        out('SLACK_CHANNEL                  = ' + engine.monitor.config().SLACK_CHANNEL);
      });
    });

  program
    .command('alerts')
    .description('list unacknowledged alerts')
    .action(async function(_options: object, command: Command) {
      await withEngine(command, false, function(engine) {
        const alerts = engine.store.getActiveAlerts();
        if (alerts.length === 0) {
          out(paint.green('No active alerts'));
          return;
        }
        for (const alert of alerts) out(paint.red(formatAlertLine(alert)));
      });
    });

  program
    .command('ack <id>')
    .description('acknowledge an alert')
    .action(async function(idText: string, _options: object, command: Command) {
      const id = parseAlertId(idText);
      await withEngine(command, false, function(engine) {
        if (!engine.store.acknowledgeAlert(id)) {
          throw new ValidationError('No alert with id ' + id);
        }
        out(paint.green('✓ Alert ' + id + ' acknowledged'));
      });
    });

  program
    .command('history [hours]')
    .description('statistics and recent readings (default 24 hours)')
    .action(async function(hoursText: string | undefined, _options: object, command: Command) {
      const hours = parseHours(hoursText);
      await withEngine(command, false, function(engine) {
        heading('History');
        for (const line of formatStatisticsLines(engine.store.getStatistics(hours), hours)) out(line);
        out(paint.gray('─'.repeat(40)));
        const readings = engine.store.getReadings(hours, HISTORY_ROW_LIMIT);
        if (readings.length === 0) {
          out(paint.gray('No readings'));
          return;
        }
        for (const reading of readings) {
          const row = formatHistoryRow(reading);
          out(reading.status === 'leak_detected' ? paint.red(row) : row);
        }
      });
    });

  program
    .command('test-slack')
    .description('send a test message to the configured channel')
    .action(async function(_options: object, command: Command) {
      await withEngine(command, false, async function(engine) {
        if (!engine.notifier.isEnabled()) {
          throw new Error('Slack notifications are disabled (check SLACK_ENABLED and SLACK_BOT_TOKEN)');
        }
        if (!await engine.notifier.testConnection()) {
          throw new Error('Test message was not delivered to ' + engine.config.SLACK_CHANNEL);
        }
        out(paint.green('✓ Test message sent to ' + engine.config.SLACK_CHANNEL));
      });
    });

  return program;
}
