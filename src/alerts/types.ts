/**
 * Alert event model: the contract between the decision engine and the
 * notification channels.
 *
 * Each alert kind carries only its own fields: resource alerts carry the
 * triggering value and window, recovery carries the downtime, and an
 * unhealthy alert carries nothing beyond the common fields.
 */

export type AlertKind = 'unhealthy' | 'high_cpu' | 'high_ram' | 'recovery';
export type AlertSeverity = 'critical' | 'warning' | 'info';

interface AlertBase {
  readonly containerId: string;
  readonly containerName: string;
  readonly timestamp: number;
}

export interface UnhealthyAlert extends AlertBase {
  readonly kind: 'unhealthy';
  readonly severity: 'critical';
}

export interface ResourceAlert extends AlertBase {
  readonly kind: 'high_cpu' | 'high_ram';
  readonly severity: 'warning';
  /** Latest sample, in percent. */
  readonly value: number;
  /** The full window that satisfied the sustained condition, oldest first. */
  readonly history: readonly number[];
  readonly threshold: number;
}

export interface RecoveryAlert extends AlertBase {
  readonly kind: 'recovery';
  readonly severity: 'info';
  readonly downtimeMs: number | null;
  /** Whole minutes, rounded down, e.g. "10 minutes". */
  readonly downtime: string | null;
}

export type AlertEvent = UnhealthyAlert | ResourceAlert | RecoveryAlert;

const MINUTE_MS = 60_000;

export const formatDowntime = (downtimeMs: number | null): string | null => {
  if (downtimeMs === null) return null;
  return `${Math.floor(downtimeMs / MINUTE_MS)} minutes`;
};

// ── Constructors ────────────────────────────────────────────────────

interface Identity {
  containerId: string;
  containerName: string;
}

export const unhealthyAlert = (who: Identity, timestamp: number): UnhealthyAlert => {
  const alert: UnhealthyAlert = {
    containerId: who.containerId,
    containerName: who.containerName,
    kind: 'unhealthy',
    severity: 'critical',
    timestamp
  };
  return Object.freeze(alert);
};

export const resourceAlert = (
  kind: ResourceAlert['kind'],
  who: Identity,
  value: number,
  history: readonly number[],
  threshold: number,
  timestamp: number
): ResourceAlert => {
  const alert: ResourceAlert = {
    containerId: who.containerId,
    containerName: who.containerName,
    kind,
    severity: 'warning',
    value,
    history: Object.freeze([...history]),
    threshold,
    timestamp
  };
  return Object.freeze(alert);
};

export const recoveryAlert = (who: Identity, downtimeMs: number | null, timestamp: number): RecoveryAlert => {
  const alert: RecoveryAlert = {
    containerId: who.containerId,
    containerName: who.containerName,
    kind: 'recovery',
    severity: 'info',
    downtimeMs,
    downtime: formatDowntime(downtimeMs),
    timestamp
  };
  return Object.freeze(alert);
};

// ── Batch ───────────────────────────────────────────────────────────

export interface AlertBatch {
  readonly critical: readonly AlertEvent[];
  readonly warning: readonly AlertEvent[];
  readonly recovery: readonly RecoveryAlert[];
  readonly timestamp: number;
  /** Critical or warning alerts present. */
  readonly hasActionable: boolean;
  readonly hasRecovery: boolean;
  /** Critical plus warning; recoveries are not counted. */
  readonly actionableCount: number;
}

const isRecovery = (event: AlertEvent): event is RecoveryAlert => event.kind === 'recovery';

/**
 * Partition a tick's events. Recovery events are info severity and therefore
 * land only in the recovery partition.
 */
export const createAlertBatch = (events: readonly AlertEvent[], timestamp: number): AlertBatch => {
  const critical = events.filter((e) => e.severity === 'critical');
  const warning = events.filter((e) => e.severity === 'warning');
  const recovery = events.filter(isRecovery);
  const batch: AlertBatch = {
    critical: Object.freeze(critical),
    warning: Object.freeze(warning),
    recovery: Object.freeze(recovery),
    timestamp,
    hasActionable: critical.length > 0 || warning.length > 0,
    hasRecovery: recovery.length > 0,
    actionableCount: critical.length + warning.length
  };
  return Object.freeze(batch);
};

export const emptyBatch = (timestamp: number): AlertBatch => createAlertBatch([], timestamp);

// ── Wire form ───────────────────────────────────────────────────────

export interface AlertRecord {
  container_id: string;
  container_name: string;
  alert_type: AlertKind;
  priority: AlertSeverity;
  value: number | null;
  timestamp: string;
  history: number[] | null;
  downtime: string | null;
}

/** Flat JSON-safe form used by logs, webhooks and the alert history. */
export const toAlertRecord = (event: AlertEvent): AlertRecord => ({
  container_id: event.containerId,
  container_name: event.containerName,
  alert_type: event.kind,
  priority: event.severity,
  value: event.kind === 'high_cpu' || event.kind === 'high_ram' ? event.value : null,
  timestamp: new Date(event.timestamp).toISOString(),
  history: event.kind === 'high_cpu' || event.kind === 'high_ram' ? [...event.history] : null,
  downtime: event.kind === 'recovery' ? event.downtime : null
});
