/**
 * Alert policy: thresholds, cooldowns, notification channels and
 * per-container rules, loaded from a YAML file.
 *
 * The parsed policy is immutable. Reloading produces a new AlertPolicy that
 * replaces the old one by reference (see AlertPolicyProvider), so a tick that
 * holds a policy never observes a half-applied reload.
 */

import fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import type { AlertPolicyData, ContainerRule, DiscordSettings, EmailSettings } from './types.js';

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

/** YAML booleans, plus the string forms left behind by ${VAR} expansion. */
const flag = (fallback: boolean) =>
  z.preprocess((v) => {
    if (typeof v !== 'string') return v;
    const s = v.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(s)) return true;
    if (['0', 'false', 'no', 'off'].includes(s)) return false;
    return v;
  }, z.boolean().default(fallback));

/** YAML numbers, plus numeric strings left behind by ${VAR} expansion. An empty value stays null and fails. */
const numeric = <T extends z.ZodTypeAny>(schema: (n: z.ZodNumber) => T) =>
  z.preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    schema(z.number({ invalid_type_error: 'must be a number' }))
  );

const percent = numeric((n) => n.min(0, 'must be between 0 and 100').max(100, 'must be between 0 and 100'));
const atLeastOne = numeric((n) => n.min(1, 'must be at least 1'));
const emailAddress = z.string().regex(/^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, 'invalid email format');

/** Fill in `enabled` before discriminating, so an absent flag picks the default branch. */
const withEnabledDefault = <T extends z.ZodTypeAny>(fallback: boolean, schema: T) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return { enabled: false };
    if (!isRecord(v)) return v;
    const enabled = v.enabled;
    if (enabled === undefined) return { ...v, enabled: fallback };
    if (typeof enabled === 'string') return { ...v, enabled: ['1', 'true', 'yes', 'on'].includes(enabled.trim().toLowerCase()) };
    return v;
  }, schema);

const emailSchema = withEnabledDefault(
  true,
  z.discriminatedUnion('enabled', [
    z.object({
      enabled: z.literal(true),
      smtp_server: z.string().min(1),
      smtp_port: numeric((n) => n.int().min(1, 'must be between 1 and 65535').max(65535, 'must be between 1 and 65535')),
      use_tls: flag(true),
      sender_email: emailAddress,
      sender_password: z.string(),
      recipient_emails: z.array(emailAddress).min(1, 'at least one recipient email is required')
    }),
    z.object({ enabled: z.literal(false) })
  ])
);

const discordSchema = withEnabledDefault(
  false,
  z.discriminatedUnion('enabled', [
    z.object({ enabled: z.literal(true), webhook_url: z.string().url() }),
    z.object({ enabled: z.literal(false) })
  ])
);

const containerRuleSchema = z.object({
  name: z.string().min(1),
  cpu_threshold: percent.optional(),
  ram_threshold: percent.optional(),
  alerts_disabled: flag(false)
});

export const alertPolicySchema = z.object({
  app: z.object({
    base_url: z.string().url()
  }),
  thresholds: z.object({
    cpu_percent: percent,
    ram_percent: percent,
    duration_minutes: atLeastOne
  }),
  alerts: z.object({
    enabled: flag(true),
    cooldown_minutes: atLeastOne.default(15),
    recovery_cooldown_minutes: atLeastOne.default(5)
  }),
  notifications: z
    .object({
      enabled: flag(true),
      send_recovery: flag(true),
      email: emailSchema,
      discord: discordSchema
    })
    .default({}),
  container_rules: z.array(containerRuleSchema).nullish().transform((rules) => rules ?? [])
});

const MINUTE_MS = 60_000;

const ENV_REF = /\$\{([^}]+)\}/g;

/** Replace ${VAR} in every string; unknown variables are left as written. */
export const expandEnvVars = (value: unknown, env: NodeJS.ProcessEnv): unknown => {
  if (typeof value === 'string') {
    return value.replace(ENV_REF, (match, name: string) => env[name] ?? match);
  }
  if (Array.isArray(value)) return value.map((item) => expandEnvVars(item, env));
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, expandEnvVars(v, env)]));
  }
  return value;
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
};

export class AlertPolicy {
  readonly data: Readonly<AlertPolicyData>;

  constructor(data: AlertPolicyData) {
    this.data = deepFreeze(data);
  }

  get baseUrl(): string {
    return this.data.app.base_url.replace(/\/+$/, '');
  }

  /** Both the alert system and the notification layer must be on. */
  isEnabled(): boolean {
    return this.data.alerts.enabled && this.data.notifications.enabled;
  }

  rule(containerName: string): ContainerRule | undefined {
    return this.data.container_rules.find((r) => r.name === containerName);
  }

  cpuThreshold(containerName: string): number {
    return this.rule(containerName)?.cpu_threshold ?? this.data.thresholds.cpu_percent;
  }

  ramThreshold(containerName: string): number {
    return this.rule(containerName)?.ram_threshold ?? this.data.thresholds.ram_percent;
  }

  isContainerDisabled(containerName: string): boolean {
    return this.rule(containerName)?.alerts_disabled ?? false;
  }

  get cooldownMs(): number {
    return this.data.alerts.cooldown_minutes * MINUTE_MS;
  }

  get recoveryCooldownMs(): number {
    return this.data.alerts.recovery_cooldown_minutes * MINUTE_MS;
  }

  get durationMinutes(): number {
    return this.data.thresholds.duration_minutes;
  }

  get sendRecovery(): boolean {
    return this.data.notifications.send_recovery;
  }

  get email(): EmailSettings {
    return this.data.notifications.email;
  }

  get discord(): DiscordSettings {
    return this.data.notifications.discord;
  }

  /** Samples needed to cover duration_minutes at the given poll interval. */
  historyCapacity(pollIntervalMs: number): number {
    return Math.max(1, Math.ceil((this.durationMinutes * MINUTE_MS) / pollIntervalMs));
  }
}

export const parseAlertPolicy = (source: string, env: NodeJS.ProcessEnv = process.env): AlertPolicy => {
  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (err) {
    throw new ConfigError(`Alert policy is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (document === null || document === undefined || (isRecord(document) && Object.keys(document).length === 0)) {
    throw new ConfigError('Alert policy is empty');
  }

  const parsed = alertPolicySchema.safeParse(expandEnvVars(document, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Alert policy validation failed: ${issues.join('; ')}`, issues);
  }
  return new AlertPolicy(parsed.data);
};

export const loadAlertPolicy = (path: string, env: NodeJS.ProcessEnv = process.env): AlertPolicy => {
  if (!fs.existsSync(path)) {
    throw new ConfigError(
      `Alert policy not found: ${path}. Copy config/alerts.example.yml to ${path} and fill in your settings.`
    );
  }
  return parseAlertPolicy(fs.readFileSync(path, 'utf8'), env);
};
