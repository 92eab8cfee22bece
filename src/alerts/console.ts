import type { AlertPolicy } from '../config/alertPolicy.js';
import type { LogSink } from '../core/logger.js';
import { alertTemplates } from './alertTemplates.js';
import type { NotificationSink } from './interface.js';
import { toAlertRecord, type AlertBatch, type RecoveryAlert } from './types.js';

/** One JSON line per alert on stdout. Always on. */
export class ConsoleNotificationSink implements NotificationSink {
  readonly name = 'console';

  constructor(private readonly out: LogSink = process.stdout) {}

  enabled(): boolean {
    return true;
  }

  async send(batch: AlertBatch, policy: AlertPolicy): Promise<void> {
    const { title } = alertTemplates.batch(batch, policy);
    for (const event of [...batch.critical, ...batch.warning]) {
      this.out.write(`${JSON.stringify({ alert: title, ...toAlertRecord(event) })}\n`);
    }
  }

  async sendRecovery(event: RecoveryAlert, policy: AlertPolicy): Promise<void> {
    const { title } = alertTemplates.recovery(event, policy);
    this.out.write(`${JSON.stringify({ alert: title, ...toAlertRecord(event) })}\n`);
  }
}
