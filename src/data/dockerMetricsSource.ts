/**
 * Docker Metrics Source: one sample per running container per tick.
 *
 * Reads one-shot stats for every running container concurrently. The daemon
 * fills `precpu_stats` for one-shot reads, so CPU % comes from a single call
 * with no state kept between ticks.
 */

import Docker from 'dockerode';
import type { Logger } from '../core/logger.js';
import type { ContainerSample, HealthStatus } from '../core/types.js';

export interface MetricsSource {
  /** Raw samples; the engine validates each one. */
  collect(): Promise<unknown[]>;
}

// ── Narrow Docker API surface ───────────────────────────────────────

export interface ContainerSummary {
  Id: string;
  Names?: string[];
  Status?: string;
  State?: string;
}

interface CpuStats {
  cpu_usage?: { total_usage?: number; percpu_usage?: number[] };
  system_cpu_usage?: number;
  online_cpus?: number;
}

interface BlkioEntry {
  op: string;
  value: number;
}

export interface ContainerStatsPayload {
  cpu_stats?: CpuStats;
  precpu_stats?: CpuStats;
  memory_stats?: {
    usage?: number;
    limit?: number;
    stats?: { cache?: number; inactive_file?: number; total_inactive_file?: number };
  };
  networks?: Record<string, { rx_bytes?: number; tx_bytes?: number }>;
  blkio_stats?: { io_service_bytes_recursive?: BlkioEntry[] | null };
}

/** Identity only; the engine rejects it and keeps the container's existing state. */
export interface UnreadableContainer {
  containerId: string;
  containerName: string;
}

export interface DockerClient {
  listRunning(): Promise<ContainerSummary[]>;
  oneShotStats(containerId: string): Promise<ContainerStatsPayload>;
}

export const dockerodeClient = (docker: Docker): DockerClient => ({
  listRunning: () => docker.listContainers({ all: false }),
  oneShotStats: (containerId) => docker.getContainer(containerId).stats({ stream: false })
});

// ── Stats arithmetic ────────────────────────────────────────────────

const round2 = (n: number): number => Math.round(n * 100) / 100;

/** cpuDelta / systemDelta × online CPUs × 100; 0 when either delta is not positive. */
export const computeCpuPercent = (stats: ContainerStatsPayload): number => {
  const cpuDelta = (stats.cpu_stats?.cpu_usage?.total_usage ?? 0) - (stats.precpu_stats?.cpu_usage?.total_usage ?? 0);
  const systemDelta = (stats.cpu_stats?.system_cpu_usage ?? 0) - (stats.precpu_stats?.system_cpu_usage ?? 0);
  if (cpuDelta <= 0 || systemDelta <= 0) return 0;
  const cpus = stats.cpu_stats?.online_cpus ?? stats.cpu_stats?.cpu_usage?.percpu_usage?.length ?? 1;
  return round2((cpuDelta / systemDelta) * cpus * 100);
};

/** Working-set memory: usage minus reclaimable page cache. */
export const computeMemory = (stats: ContainerStatsPayload): { usedBytes: number; limitBytes: number; percent: number } => {
  const memory = stats.memory_stats;
  const usage = memory?.usage ?? 0;
  const cache = memory?.stats?.inactive_file ?? memory?.stats?.total_inactive_file ?? memory?.stats?.cache ?? 0;
  const usedBytes = Math.max(0, usage - cache);
  const limitBytes = memory?.limit ?? 0;
  const percent = limitBytes > 0 ? round2((usedBytes / limitBytes) * 100) : 0;
  return { usedBytes, limitBytes, percent };
};

export const sumNetwork = (stats: ContainerStatsPayload): { rx: number; tx: number } => {
  let rx = 0;
  let tx = 0;
  for (const iface of Object.values(stats.networks ?? {})) {
    rx += iface.rx_bytes ?? 0;
    tx += iface.tx_bytes ?? 0;
  }
  return { rx, tx };
};

export const sumBlockIo = (stats: ContainerStatsPayload): { read: number; write: number } => {
  let read = 0;
  let write = 0;
  for (const entry of stats.blkio_stats?.io_service_bytes_recursive ?? []) {
    const op = entry.op.toLowerCase();
    if (op === 'read') read += entry.value;
    else if (op === 'write') write += entry.value;
  }
  return { read, write };
};

/** Health from the status text, e.g. "Up 3 minutes (unhealthy)". */
export const parseHealth = (status: string | undefined): HealthStatus => {
  if (!status) return 'none';
  if (status.includes('(unhealthy)')) return 'unhealthy';
  if (status.includes('(healthy)')) return 'healthy';
  if (status.includes('(health: starting)')) return 'starting';
  return 'none';
};

export const containerName = (summary: ContainerSummary): string => {
  const first = summary.Names?.[0];
  return first ? first.replace(/^\//, '') : summary.Id.slice(0, 12);
};

export const toSample = (summary: ContainerSummary, stats: ContainerStatsPayload): ContainerSample => {
  const memory = computeMemory(stats);
  const network = sumNetwork(stats);
  const blockIo = sumBlockIo(stats);
  return {
    containerId: summary.Id,
    containerName: containerName(summary),
    cpuPercent: computeCpuPercent(stats),
    ramPercent: memory.percent,
    healthStatus: parseHealth(summary.Status),
    memoryUsageBytes: memory.usedBytes,
    memoryLimitBytes: memory.limitBytes,
    networkRxBytes: network.rx,
    networkTxBytes: network.tx,
    blockReadBytes: blockIo.read,
    blockWriteBytes: blockIo.write
  };
};

const describeReason = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

// ── Source ──────────────────────────────────────────────────────────

export class DockerMetricsSource implements MetricsSource {
  constructor(
    private readonly client: DockerClient,
    private readonly logger: Logger
  ) {}

  static fromSocket(socketPath: string, logger: Logger): DockerMetricsSource {
    return new DockerMetricsSource(dockerodeClient(new Docker({ socketPath })), logger);
  }

  /** Rejects only when the container list itself cannot be read. */
  async collect(): Promise<Array<ContainerSample | UnreadableContainer>> {
    const running = await this.client.listRunning();
    const settled = await Promise.allSettled(
      running.map(async (summary) => toSample(summary, await this.client.oneShotStats(summary.Id)))
    );

    return running.map((summary, i): ContainerSample | UnreadableContainer => {
      const result = settled[i];
      if (result?.status === 'fulfilled') return result.value;

      // Still listed as running, so it stays present for this tick with no metrics.
      this.logger.warn('container stats unavailable, skipping', {
        containerId: summary.Id,
        error: result ? describeReason(result.reason) : 'no result'
      });
      return { containerId: summary.Id, containerName: containerName(summary) };
    });
  }
}
