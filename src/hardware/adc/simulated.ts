/**
 * Simulated converter for bench runs without hardware
 */

import { clamp } from '@utils/number';
import { AcquisitionError } from '$types/errors';
import type { AnalogReader, SimulatedReaderOptions } from './types';
import { captureAcquisition, isValidChannel, FULL_SCALE_V } from './helpers';

export interface SimulatedReader extends AnalogReader {
  /** Move a channel's centre value */
  setLevel(channel: number, raw: number): void;
}

/**
 * @param options - Per-channel levels and noise amplitude
 * @param random - Uniform [0, 1) source
 */
export function createSimulatedReader(
  options: SimulatedReaderOptions,
  random: () => number = Math.random
): SimulatedReader {
  const levels = new Map<number, number>();
  for (const key of Object.keys(options.levels)) {
    const channel = Number(key);
    levels.set(channel, options.levels[channel]);
  }

  function sample(channel: number): number {
    if (!isValidChannel(channel)) {
      throw new AcquisitionError(channel, 'channel must be 0-3');
    }
    const centre = levels.get(channel) || 0;
    const jitter = (random() * 2 - 1) * options.noise;
    return Math.round(clamp(centre + jitter, 0, 65535));
  }

  return {
    name: 'simulated',
    readRaw: function(channel: number) {
      return captureAcquisition(channel, async function() {
        return sample(channel);
      });
    },
    readVoltage: function(channel: number) {
      return captureAcquisition(channel, async function() {
        return sample(channel) * FULL_SCALE_V / 65536;
      });
    },
    close: async function() {
      levels.clear();
    },
    setLevel: function(channel: number, raw: number) {
      levels.set(channel, raw);
    }
  };
}
