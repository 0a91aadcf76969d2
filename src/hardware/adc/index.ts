export { createAds1115Reader, buildConfigWord, openI2cBus } from './ads1115';
export { createSimulatedReader } from './simulated';
export type { SimulatedReader } from './simulated';
export { createChannelLock } from './channel-lock';
export { captureAcquisition, isValidChannel, signedToRaw, signedToVolts, CHANNEL_COUNT, FULL_SCALE_V } from './helpers';
export * from './types';
