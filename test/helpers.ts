/**
 * Shared test helpers: mock factories for all modules.
 */

import { alertPolicySchema, AlertPolicy } from '../src/config/alertPolicy.js';
import type { LogContext, Logger, LogLevel } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import type { Clock, ContainerSample } from '../src/core/types.js';
import type { NotificationSink } from '../src/alerts/interface.js';
import type { AlertBatch, RecoveryAlert } from '../src/alerts/types.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/** Records every entry; children share the parent's entry list. */
export const createMockLogger = (): Logger & { entries: LogEntry[] } => {
  const entries: LogEntry[] = [];
  const logger: Logger & { entries: LogEntry[] } = {
    entries,
    debug: (message, context) => { entries.push({ level: 'debug', message, context }); },
    info: (message, context) => { entries.push({ level: 'info', message, context }); },
    warn: (message, context) => { entries.push({ level: 'warn', message, context }); },
    error: (message, context) => { entries.push({ level: 'error', message, context }); },
    child: () => logger,
  };
  return logger;
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number>; gauges: Map<string, number> } => {
  const counters = new Map<string, number>();
  const gauges = new Map<string, number>();
  return {
    counters,
    gauges,
    increment(name: string, value = 1) { counters.set(name, (counters.get(name) ?? 0) + value); },
    gauge(name: string, value: number) { gauges.set(name, value); },
  };
};

// ── Manual Clock ────────────────────────────────────────────────────

export const T0 = Date.UTC(2026, 0, 1, 0, 0, 0);
export const MINUTE = 60_000;

export class ManualClock implements Clock {
  constructor(public current: number = T0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

// ── Policy Factory ──────────────────────────────────────────────────

export interface PolicyOverrides {
  app?: Record<string, unknown>;
  thresholds?: Record<string, unknown>;
  alerts?: Record<string, unknown>;
  notifications?: Record<string, unknown>;
  container_rules?: Record<string, unknown>[];
}

/** cpu 80 / ram 80 / 3 minutes, cooldown 15, recovery cooldown 5, no email or discord. */
export function makePolicy(overrides: PolicyOverrides = {}): AlertPolicy {
  return new AlertPolicy(
    alertPolicySchema.parse({
      app: { base_url: 'http://watch.test', ...overrides.app },
      thresholds: { cpu_percent: 80, ram_percent: 80, duration_minutes: 3, ...overrides.thresholds },
      alerts: { enabled: true, cooldown_minutes: 15, recovery_cooldown_minutes: 5, ...overrides.alerts },
      notifications: {
        enabled: true,
        send_recovery: true,
        email: { enabled: false },
        discord: { enabled: false },
        ...overrides.notifications,
      },
      container_rules: overrides.container_rules ?? [],
    })
  );
}

export const EMAIL_SETTINGS = {
  enabled: true,
  smtp_server: 'smtp.test',
  smtp_port: 587,
  use_tls: true,
  sender_email: 'watch@example.com',
  sender_password: 'test-secret',
  recipient_emails: ['ops@example.com', 'oncall@example.com'],
};

/** A single-policy source for the engine. */
export const fixedPolicy = (policy: AlertPolicy): { current(): AlertPolicy } => ({ current: () => policy });

// ── Sample Factory ──────────────────────────────────────────────────

export function makeSample(overrides: Partial<ContainerSample> = {}): ContainerSample {
  return {
    containerId: 'c1',
    containerName: 'web',
    cpuPercent: 10,
    ramPercent: 10,
    healthStatus: 'healthy',
    ...overrides,
  };
}

// ── Recording Sink ──────────────────────────────────────────────────

export interface RecordingSink extends NotificationSink {
  batches: AlertBatch[];
  recoveries: RecoveryAlert[];
}

export const createRecordingSink = (
  name = 'recording',
  opts: { enabled?: boolean; failWith?: Error } = {}
): RecordingSink => {
  const batches: AlertBatch[] = [];
  const recoveries: RecoveryAlert[] = [];
  return {
    name,
    batches,
    recoveries,
    enabled: () => opts.enabled ?? true,
    async send(batch) {
      if (opts.failWith) throw opts.failWith;
      batches.push(batch);
    },
    async sendRecovery(event) {
      if (opts.failWith) throw opts.failWith;
      recoveries.push(event);
    },
  };
};
