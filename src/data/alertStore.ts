/**
 * Alert Store: in-memory ring buffer of recently emitted alerts.
 *
 * Holds the last N alert records for inspection; nothing reads it back into
 * the decision path.
 */

import { toAlertRecord, type AlertEvent, type AlertKind, type AlertRecord, type AlertSeverity } from '../alerts/types.js';

export interface AlertEntry extends AlertRecord {
  id: number;
  /** Epoch ms, kept alongside the ISO `timestamp` for range queries. */
  at: number;
}

export class AlertStore {
  private readonly buffer: AlertEntry[] = [];
  private readonly maxSize: number;
  private nextId = 1;

  constructor(maxSize = 500) {
    this.maxSize = maxSize;
  }

  push(event: AlertEvent): AlertEntry {
    const entry: AlertEntry = { ...toAlertRecord(event), id: this.nextId++, at: event.timestamp };
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
    return entry;
  }

  /** Newest first. */
  getRecent(limit = 100): AlertEntry[] {
    const start = Math.max(0, this.buffer.length - limit);
    return this.buffer.slice(start).reverse();
  }

  getByContainer(containerId: string, limit = 100): AlertEntry[] {
    return this.newest((a) => a.container_id === containerId, limit);
  }

  getBySeverity(priority: AlertSeverity, limit = 100): AlertEntry[] {
    return this.newest((a) => a.priority === priority, limit);
  }

  getByKind(kind: AlertKind, limit = 100): AlertEntry[] {
    return this.newest((a) => a.alert_type === kind, limit);
  }

  getSince(timestamp: number, limit = 200): AlertEntry[] {
    return this.newest((a) => a.at >= timestamp, limit);
  }

  get size(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer.length = 0;
  }

  private newest(predicate: (entry: AlertEntry) => boolean, limit: number): AlertEntry[] {
    const filtered = this.buffer.filter(predicate);
    const start = Math.max(0, filtered.length - limit);
    return filtered.slice(start).reverse();
  }
}
