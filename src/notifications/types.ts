/**
 * Notification types
 */

import type { CombinedReading } from '$types/common';

/**
 * Outbound alert channel
 *
 * Every method resolves to whether the message was delivered and never
 * rejects; a disabled notifier resolves false without doing anything.
 */
export interface Notifier {
  notifyLeak(reading: CombinedReading): Promise<boolean>;
  notifySystem(kind: string, message: string): Promise<boolean>;
  notifyRecovery(message: string): Promise<boolean>;
  /** Send a startup message to check the credentials */
  testConnection(): Promise<boolean>;
  isEnabled(): boolean;
}
