/**
 * Analog reader types
 */

import type { Result } from '$types/common';

/**
 * A multi-channel analog-to-digital converter
 *
 * Reads never throw; failures come back as `{ ok: false }`.
 */
export interface AnalogReader {
  /** Driver name for logs */
  readonly name: string;
  /** One raw conversion, scaled to 0..65535 */
  readRaw(channel: number): Promise<Result<number>>;
  /** One conversion in volts */
  readVoltage(channel: number): Promise<Result<number>>;
  /** Release the bus */
  close(): Promise<void>;
}

/**
 * The part of an i2c-bus PromisifiedBus the ADS1115 driver uses
 */
export interface I2cBus {
  writeI2cBlock(address: number, command: number, length: number, buffer: Buffer): Promise<unknown>;
  readI2cBlock(address: number, command: number, length: number, buffer: Buffer): Promise<{ bytesRead: number; buffer: Buffer }>;
  close(): Promise<void>;
}

export type I2cBusOpener = (busNumber: number) => Promise<I2cBus>;

export interface Ads1115Options {
  /** I²C bus number (1 on a Raspberry Pi) */
  busNumber: number;
  /** 7-bit device address, 0x48..0x4B */
  address: number;
}

export interface SimulatedReaderOptions {
  /** Centre raw value per channel; channels not listed read 0 */
  levels: Record<number, number>;
  /** Uniform noise amplitude in raw counts */
  noise: number;
}

/**
 * Serializes acquisitions per channel
 */
export interface ChannelLock {
  run<T>(channel: number, work: () => Promise<T>): Promise<T>;
}
