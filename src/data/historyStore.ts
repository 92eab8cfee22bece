import Database from 'better-sqlite3';
import type { ContainerSample, HealthStatus } from '../core/types.js';

const DAY_MS = 86_400_000;

export interface HistoryRow {
  containerId: string;
  containerName: string;
  ts: number;
  cpuPercent: number;
  ramPercent: number;
  health: HealthStatus;
  memoryUsageBytes: number | null;
  memoryLimitBytes: number | null;
  networkRxBytes: number | null;
  networkTxBytes: number | null;
  blockReadBytes: number | null;
  blockWriteBytes: number | null;
}

export interface TrackedContainer {
  containerId: string;
  containerName: string;
  sampleCount: number;
  firstSeen: number;
  lastSeen: number;
}

export interface HistoryStats {
  totalRecords: number;
  uniqueContainers: number;
  oldest: number | null;
  newest: number | null;
}

/** What the monitor loop needs from a history store. */
export interface SampleRecorder {
  recordSamples(samples: readonly ContainerSample[], at: number): Promise<number>;
}

const CSV_COLUMNS = [
  'timestamp',
  'cpu_percent',
  'ram_percent',
  'health',
  'memory_usage_bytes',
  'memory_limit_bytes',
  'network_rx_bytes',
  'network_tx_bytes',
  'block_read_bytes',
  'block_write_bytes'
] as const;

const ROW_COLUMNS = `
  container_id as containerId,
  container_name as containerName,
  ts,
  cpu_percent as cpuPercent,
  ram_percent as ramPercent,
  health,
  memory_usage_bytes as memoryUsageBytes,
  memory_limit_bytes as memoryLimitBytes,
  network_rx_bytes as networkRxBytes,
  network_tx_bytes as networkTxBytes,
  block_read_bytes as blockReadBytes,
  block_write_bytes as blockWriteBytes`;

/** Rolling per-container sample history in SQLite. Alerting never reads it. */
export class HistoryStore implements SampleRecorder {
  private readonly db: Database.Database;

  constructor(dbPath = './data/history.sqlite') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS container_samples (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        container_id TEXT NOT NULL,
        container_name TEXT NOT NULL,
        ts INTEGER NOT NULL,
        cpu_percent REAL NOT NULL,
        ram_percent REAL NOT NULL,
        health TEXT NOT NULL,
        memory_usage_bytes INTEGER,
        memory_limit_bytes INTEGER,
        network_rx_bytes INTEGER,
        network_tx_bytes INTEGER,
        block_read_bytes INTEGER,
        block_write_bytes INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_container_samples_container_ts
        ON container_samples(container_id, ts);
      CREATE INDEX IF NOT EXISTS idx_container_samples_ts
        ON container_samples(ts);
    `);
  }

  async recordSamples(samples: readonly ContainerSample[], at: number): Promise<number> {
    const stmt = this.db.prepare(`
      INSERT INTO container_samples(
        container_id, container_name, ts, cpu_percent, ram_percent, health,
        memory_usage_bytes, memory_limit_bytes, network_rx_bytes, network_tx_bytes,
        block_read_bytes, block_write_bytes
      ) VALUES(
        @containerId, @containerName, @ts, @cpuPercent, @ramPercent, @health,
        @memoryUsageBytes, @memoryLimitBytes, @networkRxBytes, @networkTxBytes,
        @blockReadBytes, @blockWriteBytes
      )
    `);

    // Every named parameter must be bound, so absent extras become null.
    const insertMany = this.db.transaction((rows: readonly ContainerSample[]) => {
      for (const s of rows) {
        stmt.run({
          containerId: s.containerId,
          containerName: s.containerName,
          ts: at,
          cpuPercent: s.cpuPercent,
          ramPercent: s.ramPercent,
          health: s.healthStatus,
          memoryUsageBytes: s.memoryUsageBytes ?? null,
          memoryLimitBytes: s.memoryLimitBytes ?? null,
          networkRxBytes: s.networkRxBytes ?? null,
          networkTxBytes: s.networkTxBytes ?? null,
          blockReadBytes: s.blockReadBytes ?? null,
          blockWriteBytes: s.blockWriteBytes ?? null
        });
      }
    });

    insertMany(samples);
    return samples.length;
  }

  /** Most recent `limit` samples for one container, oldest first. */
  async getContainerHistory(containerId: string, limit = 100): Promise<HistoryRow[]> {
    const stmt = this.db.prepare<[string, number], HistoryRow>(
      `SELECT ${ROW_COLUMNS}
       FROM container_samples
       WHERE container_id = ?
       ORDER BY ts DESC, id DESC
       LIMIT ?`
    );
    return stmt.all(containerId, limit).reverse();
  }

  async listContainers(): Promise<TrackedContainer[]> {
    const stmt = this.db.prepare<[], TrackedContainer>(
      `SELECT container_id as containerId,
              container_name as containerName,
              COUNT(*) as sampleCount,
              MIN(ts) as firstSeen,
              MAX(ts) as lastSeen
       FROM container_samples
       GROUP BY container_id, container_name
       ORDER BY lastSeen DESC, containerId ASC`
    );
    return stmt.all();
  }

  async getStats(): Promise<HistoryStats> {
    const stmt = this.db.prepare<[], HistoryStats>(
      `SELECT COUNT(*) as totalRecords,
              COUNT(DISTINCT container_id) as uniqueContainers,
              MIN(ts) as oldest,
              MAX(ts) as newest
       FROM container_samples`
    );
    return stmt.get() ?? { totalRecords: 0, uniqueContainers: 0, oldest: null, newest: null };
  }

  /** Delete samples older than `days` before `now`. Returns the number removed. */
  async cleanupOlderThan(days: number, now: number = Date.now()): Promise<number> {
    const cutoff = now - days * DAY_MS;
    return this.db.prepare<[number]>('DELETE FROM container_samples WHERE ts < ?').run(cutoff).changes;
  }

  async vacuum(): Promise<void> {
    this.db.exec('VACUUM');
  }

  /** Retention pass: delete old samples, then reclaim the space if any went. */
  async prune(days: number, now: number = Date.now()): Promise<number> {
    const removed = await this.cleanupOlderThan(days, now);
    if (removed > 0) await this.vacuum();
    return removed;
  }

  /** CSV of one container's samples, oldest first; empty extras are empty cells. */
  async exportCsv(containerId: string): Promise<string> {
    const stmt = this.db.prepare<[string], HistoryRow>(
      `SELECT ${ROW_COLUMNS}
       FROM container_samples
       WHERE container_id = ?
       ORDER BY ts ASC, id ASC`
    );
    const lines = stmt.all(containerId).map((row) =>
      [
        new Date(row.ts).toISOString(),
        row.cpuPercent,
        row.ramPercent,
        row.health,
        row.memoryUsageBytes,
        row.memoryLimitBytes,
        row.networkRxBytes,
        row.networkTxBytes,
        row.blockReadBytes,
        row.blockWriteBytes
      ]
        .map((v) => (v === null ? '' : String(v)))
        .join(',')
    );
    return [CSV_COLUMNS.join(','), ...lines].join('\n') + '\n';
  }

  close(): void {
    this.db.close();
  }
}
