import axios from 'axios';
import type { AlertPolicy } from '../config/alertPolicy.js';
import { withRetry, type RetryOptions } from '../core/retry.js';
import { alertTemplates, type AlertTemplate } from './alertTemplates.js';
import type { NotificationSink } from './interface.js';
import type { AlertBatch, RecoveryAlert } from './types.js';

/** Discord rejects message content longer than this. */
export const DISCORD_CONTENT_LIMIT = 2000;

export interface WebhookPoster {
  post(url: string, body: unknown): Promise<unknown>;
}

export const formatDiscordContent = (template: AlertTemplate): string => {
  const content = `**${template.title}**\n${template.message}`;
  // Cut on code points so an emoji is never split in half.
  const chars = Array.from(content);
  return chars.length <= DISCORD_CONTENT_LIMIT ? content : `${chars.slice(0, DISCORD_CONTENT_LIMIT - 1).join('')}…`;
};

export class DiscordNotificationSink implements NotificationSink {
  readonly name = 'discord';

  constructor(
    private readonly client: WebhookPoster = axios.create({ timeout: 10_000 }),
    private readonly retry: RetryOptions = { retries: 3, baseDelayMs: 500 }
  ) {}

  enabled(policy: AlertPolicy): boolean {
    return policy.discord.enabled;
  }

  async send(batch: AlertBatch, policy: AlertPolicy): Promise<void> {
    if (!batch.hasActionable) return;
    await this.post(alertTemplates.batch(batch, policy), policy);
  }

  async sendRecovery(event: RecoveryAlert, policy: AlertPolicy): Promise<void> {
    await this.post(alertTemplates.recovery(event, policy), policy);
  }

  private async post(template: AlertTemplate, policy: AlertPolicy): Promise<void> {
    const settings = policy.discord;
    if (!settings.enabled) return;
    await withRetry(() => this.client.post(settings.webhook_url, { content: formatDiscordContent(template) }), this.retry);
  }
}
