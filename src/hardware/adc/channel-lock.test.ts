import { createChannelLock } from './channel-lock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('channel lock', () => {
  it('should run work on the same channel one at a time', async () => {
    const lock = createChannelLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run(0, async () => {
      order.push('first start');
      await gate.promise;
      order.push('first end');
      return 1;
    });
    const second = lock.run(0, async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first start']);

    gate.resolve();

    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(order).toEqual(['first start', 'first end', 'second']);
  });

  it('should let different channels overlap', async () => {
    const lock = createChannelLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.run(0, async () => {
      await gate.promise;
      order.push('channel 0');
    });
    await lock.run(1, async () => {
      order.push('channel 1');
    });

    gate.resolve();
    await blocked;

    expect(order).toEqual(['channel 1', 'channel 0']);
  });

  it('should keep going after a failed acquisition', async () => {
    const lock = createChannelLock();

    const failing = lock.run(0, async () => {
      throw new Error('bus error');
    });
    const next = lock.run(0, async () => 'ok');

    await expect(failing).rejects.toThrow('bus error');
    await expect(next).resolves.toBe('ok');
  });
});
