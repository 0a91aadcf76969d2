/**
 * Boot types: configuration store and the assembled engine
 */

import type { MonitorConfig, MonitorUserConfig, Result } from '$types';
import type { AnalogReader } from '@hardware/adc';
import type { ConsoleAPI, FetchFn, InitMessage, Logger } from '@logging';
import type { SlackNotifier } from '@notifications/slack';
import type { ReadingStore } from '@storage';
import type { DualSensorCoordinator } from '@system/dual-sensor';
import type { LeakMonitor } from '@system/monitor';
import type { SleepFn } from '@utils/time';

export type { InitMessage };

/**
 * Values that only ever come from the environment
 */
export interface ConfigSecrets {
  /** Slack bot token for alert notifications */
  slackBotToken: string;
  /** Slack incoming webhook for log forwarding */
  slackWebhookUrl: string;
}

export interface ConfigStoreOptions {
  /** JSON config file */
  path: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: Readonly<Record<string, string | undefined>>;
  /** Optional .env file; variables already in the environment win */
  envFile?: string | null;
}

export interface LoadedConfig {
  config: MonitorConfig;
  secrets: ConfigSecrets;
  /** Whether a config file was read or only defaults apply */
  source: 'file' | 'defaults';
  /** One line per ignored or replaced field */
  warnings: string[];
}

export interface ConfigStore {
  readonly path: string;
  load(): LoadedConfig;
  save(config: MonitorUserConfig): Result<void>;
  /** load() again when the file changed since the last load() or save() */
  reloadIfChanged(): LoadedConfig | null;
}

export interface InitOptions {
  configPath: string;
  envFile?: string | null;
  env?: Readonly<Record<string, string | undefined>>;
  /** Force DEBUG level on the logger and the console */
  debug?: boolean;
  consoleApi?: ConsoleAPI;
  fetchApi?: FetchFn;
  /** Replaces the configured converter */
  openReader?: () => Promise<AnalogReader>;
  sleep?: SleepFn;
  clock?: () => number;
}

/**
 * Everything initialize() wires together
 */
export interface Engine {
  readonly config: MonitorConfig;
  readonly logger: Logger;
  readonly store: ReadingStore;
  readonly notifier: SlackNotifier;
  readonly sensors: DualSensorCoordinator;
  readonly monitor: LeakMonitor;
  readonly configStore: ConfigStore;
  /** Stop the loop, close the database and flush the logs */
  shutdown(): Promise<void>;
}
