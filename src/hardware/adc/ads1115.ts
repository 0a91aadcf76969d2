/**
 * ADS1115 16-bit converter over I²C
 *
 * Single-shot conversions at gain 1 (±4.096 V) and 128 samples/s. The
 * i2c-bus package is an optional dependency and is only loaded when the
 * driver is opened, so bench setups without it still start.
 *
 * The chip has one mux and one conversion register, so every
 * write-config, wait, read-result step holds a device-wide lock whatever
 * the channel.
 */

import type { SleepFn } from '@utils/time';
import { sleep as defaultSleep } from '@utils/time';
import { AcquisitionError } from '$types/errors';
import type { AnalogReader, Ads1115Options, I2cBus, I2cBusOpener } from './types';
import { createChannelLock } from './channel-lock';
import { captureAcquisition, isValidChannel, signedToRaw, signedToVolts } from './helpers';

const REG_CONVERSION = 0x00;
const REG_CONFIG = 0x01;

const CONFIG_OS_SINGLE = 0x8000;
const CONFIG_PGA_4_096V = 1 << 9;
const CONFIG_MODE_SINGLE = 1 << 8;
const CONFIG_DR_128SPS = 4 << 5;
const CONFIG_COMP_DISABLE = 0x03;

/** One conversion at 128 SPS takes ~7.8 ms */
const CONVERSION_WAIT_MS = 9;

/**
 * Config register word for a single-ended single-shot read of `channel`
 */
export function buildConfigWord(channel: number): number {
  return CONFIG_OS_SINGLE |
    ((4 + channel) << 12) |
    CONFIG_PGA_4_096V |
    CONFIG_MODE_SINGLE |
    CONFIG_DR_128SPS |
    CONFIG_COMP_DISABLE;
}

/**
 * Open the bus through i2c-bus
 */
export async function openI2cBus(busNumber: number): Promise<I2cBus> {
  const i2c = await import('i2c-bus');
  return i2c.openPromisified(busNumber);
}

/**
 * Open an ADS1115 reader
 *
 * @param options - Bus number and device address
 * @param openBus - Bus factory, replaced in tests
 * @param sleep - Delay used while a conversion runs
 * @throws {Error} When the bus cannot be opened
 */
export async function createAds1115Reader(
  options: Ads1115Options,
  openBus: I2cBusOpener = openI2cBus,
  sleep: SleepFn = defaultSleep
): Promise<AnalogReader> {
  const bus = await openBus(options.busNumber);
  const address = options.address;
  const device = createChannelLock();

  async function convert(channel: number): Promise<number> {
    if (!isValidChannel(channel)) {
      throw new AcquisitionError(channel, 'channel must be 0-3');
    }
    return device.run(address, function() { return convertLocked(channel); });
  }

  async function convertLocked(channel: number): Promise<number> {
    const config = Buffer.alloc(2);
    config.writeUInt16BE(buildConfigWord(channel), 0);
    await bus.writeI2cBlock(address, REG_CONFIG, 2, config);

    await sleep(CONVERSION_WAIT_MS);

    const result = await bus.readI2cBlock(address, REG_CONVERSION, 2, Buffer.alloc(2));
    if (result.bytesRead !== 2) {
      throw new AcquisitionError(channel, 'short read (' + result.bytesRead + ' bytes)');
    }
    return result.buffer.readInt16BE(0);
  }

  return {
    name: 'ads1115@0x' + address.toString(16),
    readRaw: function(channel: number) {
      return captureAcquisition(channel, async function() {
        return signedToRaw(await convert(channel));
      });
    },
    readVoltage: function(channel: number) {
      return captureAcquisition(channel, async function() {
        return signedToVolts(await convert(channel));
      });
    },
    close: function() {
      return bus.close();
    }
  };
}
