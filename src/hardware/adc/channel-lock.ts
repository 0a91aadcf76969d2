/**
 * Per-channel mutual exclusion
 *
 * Each channel keeps the tail of a promise chain. A new acquisition waits for
 * the tail, then becomes the tail itself. Different channels never wait on
 * each other.
 */

import type { ChannelLock } from './types';

export function createChannelLock(): ChannelLock {
  const tails = new Map<number, Promise<void>>();

  function run<T>(channel: number, work: () => Promise<T>): Promise<T> {
    const previous = tails.get(channel) || Promise.resolve();
    const result = previous.then(work);
    const tail = result.then(
      function() { return undefined; },
      function() { return undefined; }
    );
    tails.set(channel, tail);

    void tail.then(function() {
      if (tails.get(channel) === tail) {
        tails.delete(channel);
      }
    });

    return result;
  }

  return { run: run };
}
