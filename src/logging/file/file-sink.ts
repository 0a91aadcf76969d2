/**
 * Append-only log file sink
 *
 * Lines are queued and appended in order; a failed append is reported once
 * on the fallback console and the line is dropped.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import { formatTimestamp } from '@utils/time';
import type { ConsoleAPI, FileSink, FileSinkConfig, InitMessage } from '../types';

/**
 * Create a file sink
 *
 * @param config - Sink configuration (path)
 * @param timeSource - Returns current time in seconds
 * @param fallback - Console used to report write failures
 * @returns File sink instance
 */
export function createFileSink(
  config: FileSinkConfig,
  timeSource: () => number,
  fallback: ConsoleAPI
): FileSink {
  let queue: Promise<void> = Promise.resolve();
  let failureReported = false;

  function append(line: string): Promise<void> {
    return appendFile(config.path, line, 'utf8').catch(function(err: unknown) {
      if (!failureReported) {
        failureReported = true;
        fallback.warn('Log file write failed (' + config.path + '): ' + String(err));
      }
    });
  }

  function write(formattedMessage: string): void {
    const line = formatTimestamp(timeSource()) + ' ' + formattedMessage + '\n';
    queue = queue.then(function() {
      return append(line);
    });
  }

  async function initialize(): Promise<InitMessage> {
    try {
      await mkdir(dirname(config.path), { recursive: true });
      await appendFile(config.path, '', 'utf8');
      return { success: true, message: 'Logging to ' + config.path };
    } catch (err) {
      return { success: false, message: 'Log file unavailable (' + config.path + '): ' + String(err) };
    }
  }

  function flush(): Promise<void> {
    return queue;
  }

  return {
    write: write,
    initialize: initialize,
    flush: flush,
    close: flush
  };
}
