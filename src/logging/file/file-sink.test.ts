/**
 * Unit tests for file sink
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createFileSink } from './file-sink';

describe('createFileSink', () => {
  let dir: string;
  const t = new Date(2024, 0, 2, 3, 4, 5).getTime() / 1000;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'leak-monitor-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create the file and its directory on initialize', async () => {
    const path = join(dir, 'nested', 'monitor.log');
    const sink = createFileSink({ path: path }, () => t, { log: vi.fn(), warn: vi.fn() });

    const message = await sink.initialize();

    expect(message).toEqual({ success: true, message: 'Logging to ' + path });
    expect(await readFile(path, 'utf8')).toBe('');
  });

  it('should append timestamped lines in order', async () => {
    const path = join(dir, 'monitor.log');
    const sink = createFileSink({ path: path }, () => t, { log: vi.fn(), warn: vi.fn() });

    sink.write('ℹ️ [INFO]     first', 1);
    sink.write('⚠️ [WARNING]  second', 2);
    await sink.flush();

    expect(await readFile(path, 'utf8')).toBe(
      '2024-01-02 03:04:05 ℹ️ [INFO]     first\n' +
      '2024-01-02 03:04:05 ⚠️ [WARNING]  second\n'
    );
  });

  it('should report a write failure once and keep going', async () => {
    const fallback = { log: vi.fn(), warn: vi.fn() };
    // A directory cannot be appended to
    const sink = createFileSink({ path: dir }, () => t, fallback);

    sink.write('a', 1);
    sink.write('b', 1);
    await sink.close();

    expect(fallback.warn).toHaveBeenCalledTimes(1);
  });

  it('should report an unusable path on initialize', async () => {
    const sink = createFileSink({ path: dir }, () => t, { log: vi.fn(), warn: vi.fn() });

    const message = await sink.initialize();

    expect(message.success).toBe(false);
  });
});
