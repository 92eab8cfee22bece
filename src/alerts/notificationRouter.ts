/**
 * NotificationRouter: single entry point for everything a tick wants sent.
 *
 * 1. Pushes every event to AlertStore (recent alert history)
 * 2. Delivers the batch to each enabled channel concurrently
 * 3. Delivers each recovery separately when recovery notifications are on
 *
 * A failing channel is logged and reported; it never blocks the others and
 * never touches alert state.
 */

import type { AlertPolicy } from '../config/alertPolicy.js';
import { NotificationError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { AlertStore } from '../data/alertStore.js';
import type { NotificationSink } from './interface.js';
import type { AlertBatch, RecoveryAlert } from './types.js';

export interface DeliveryReport {
  channel: string;
  /** `batch`, or the id of the recovered container. */
  subject: string;
  ok: boolean;
  error?: string;
}

export class NotificationRouter {
  constructor(
    private readonly channels: readonly NotificationSink[],
    private readonly alertStore: AlertStore,
    private readonly logger: Logger,
    private readonly metrics: Metrics
  ) {}

  get channelNames(): string[] {
    return this.channels.map((c) => c.name);
  }

  /** Record and deliver a whole tick's batch. */
  async dispatch(batch: AlertBatch, policy: AlertPolicy): Promise<DeliveryReport[]> {
    for (const event of [...batch.critical, ...batch.warning, ...batch.recovery]) {
      this.alertStore.push(event);
    }

    const reports: DeliveryReport[] = [];
    if (batch.hasActionable) {
      reports.push(...(await this.send(batch, policy)));
    }
    if (policy.sendRecovery) {
      for (const event of batch.recovery) {
        reports.push(...(await this.sendRecovery(event, policy)));
      }
    }
    return reports;
  }

  async send(batch: AlertBatch, policy: AlertPolicy): Promise<DeliveryReport[]> {
    return this.fanOut('batch', policy, (channel) => channel.send(batch, policy));
  }

  async sendRecovery(event: RecoveryAlert, policy: AlertPolicy): Promise<DeliveryReport[]> {
    return this.fanOut(event.containerId, policy, (channel) => channel.sendRecovery(event, policy));
  }

  private async fanOut(
    subject: string,
    policy: AlertPolicy,
    deliver: (channel: NotificationSink) => Promise<void>
  ): Promise<DeliveryReport[]> {
    const targets = this.channels.filter((c) => c.enabled(policy));
    const settled = await Promise.allSettled(targets.map((channel) => deliver(channel)));

    return settled.map((result, i): DeliveryReport => {
      const channel = targets[i]?.name ?? 'unknown';
      if (result.status === 'fulfilled') {
        this.metrics.increment(`notifications.${channel}.sent`);
        return { channel, subject, ok: true };
      }
      const failure = new NotificationError(`notification delivery failed for ${channel}`, channel, result.reason);
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      this.metrics.increment(`notifications.${channel}.failed`);
      this.logger.warn(failure.message, { channel, subject, code: failure.code, error: reason });
      return { channel, subject, ok: false, error: reason };
    });
  }
}
