import type { AlertPolicy } from '../config/alertPolicy.js';
import type { AlertBatch, RecoveryAlert } from './types.js';

/**
 * A delivery channel. Channels format and deliver; they never feed back into
 * alert state, so a failed delivery does not re-trigger detection.
 */
export interface NotificationSink {
  readonly name: string;
  enabled(policy: AlertPolicy): boolean;
  send(batch: AlertBatch, policy: AlertPolicy): Promise<void>;
  sendRecovery(event: RecoveryAlert, policy: AlertPolicy): Promise<void>;
}
