import { describe, expect, it } from 'vitest';
import {
  computeCpuPercent,
  computeMemory,
  containerName,
  DockerMetricsSource,
  parseHealth,
  sumBlockIo,
  sumNetwork,
  type ContainerStatsPayload,
  type ContainerSummary,
  type DockerClient
} from '../../src/data/dockerMetricsSource.js';
import { safeParseSample } from '../../src/core/types.js';
import { createMockLogger } from '../helpers.js';

const STATS: ContainerStatsPayload = {
  cpu_stats: { cpu_usage: { total_usage: 400_000_000 }, system_cpu_usage: 20_000_000_000, online_cpus: 2 },
  precpu_stats: { cpu_usage: { total_usage: 200_000_000 }, system_cpu_usage: 18_000_000_000 },
  memory_stats: { usage: 300, limit: 1000, stats: { inactive_file: 100 } },
  networks: { eth0: { rx_bytes: 100, tx_bytes: 50 }, eth1: { rx_bytes: 1, tx_bytes: 2 } },
  blkio_stats: {
    io_service_bytes_recursive: [
      { op: 'Read', value: 10 },
      { op: 'Write', value: 20 },
      { op: 'Total', value: 30 },
      { op: 'read', value: 5 }
    ]
  }
};

const fakeClient = (
  containers: ContainerSummary[],
  stats: Record<string, ContainerStatsPayload | Error>
): DockerClient => ({
  listRunning: async () => containers,
  oneShotStats: async (id) => {
    const entry = stats[id];
    if (entry === undefined) throw new Error(`no such container: ${id}`);
    if (entry instanceof Error) throw entry;
    return entry;
  }
});

describe('stats arithmetic', () => {
  it('computes cpu from the precpu delta', () => {
    expect(computeCpuPercent(STATS)).toBe(20);
  });

  it('falls back to the per-cpu count', () => {
    const stats: ContainerStatsPayload = {
      cpu_stats: { cpu_usage: { total_usage: 300, percpu_usage: [1, 1, 1, 1] }, system_cpu_usage: 1300 },
      precpu_stats: { cpu_usage: { total_usage: 200 }, system_cpu_usage: 1000 }
    };
    // 100 / 300 * 4 * 100
    expect(computeCpuPercent(stats)).toBe(133.33);
  });

  it('reports zero cpu without a usable delta', () => {
    expect(computeCpuPercent({})).toBe(0);
    expect(computeCpuPercent({ cpu_stats: STATS.cpu_stats, precpu_stats: STATS.cpu_stats })).toBe(0);
  });

  it('subtracts page cache from memory', () => {
    expect(computeMemory(STATS)).toEqual({ usedBytes: 200, limitBytes: 1000, percent: 20 });
    expect(computeMemory({ memory_stats: { usage: 500, limit: 1000, stats: { cache: 250 } } }).percent).toBe(25);
    expect(computeMemory({ memory_stats: { usage: 500 } }).percent).toBe(0);
  });

  it('sums network interfaces and block io', () => {
    expect(sumNetwork(STATS)).toEqual({ rx: 101, tx: 52 });
    expect(sumBlockIo(STATS)).toEqual({ read: 15, write: 20 });
    expect(sumBlockIo({ blkio_stats: { io_service_bytes_recursive: null } })).toEqual({ read: 0, write: 0 });
  });

  it('reads health from the status text', () => {
    expect(parseHealth('Up 3 minutes (healthy)')).toBe('healthy');
    expect(parseHealth('Up 3 minutes (unhealthy)')).toBe('unhealthy');
    expect(parseHealth('Up 5 seconds (health: starting)')).toBe('starting');
    expect(parseHealth('Up 2 hours')).toBe('none');
    expect(parseHealth(undefined)).toBe('none');
  });

  it('strips the leading slash from names', () => {
    expect(containerName({ Id: 'abcdef0123456789', Names: ['/web'] })).toBe('web');
    expect(containerName({ Id: 'abcdef0123456789' })).toBe('abcdef012345');
  });
});

describe('DockerMetricsSource', () => {
  it('builds one sample per running container', async () => {
    const client = fakeClient([{ Id: 'c1', Names: ['/web'], Status: 'Up 1 minute (healthy)' }], { c1: STATS });
    const samples = await new DockerMetricsSource(client, createMockLogger()).collect();

    expect(samples).toEqual([
      {
        containerId: 'c1',
        containerName: 'web',
        cpuPercent: 20,
        ramPercent: 20,
        healthStatus: 'healthy',
        memoryUsageBytes: 200,
        memoryLimitBytes: 1000,
        networkRxBytes: 101,
        networkTxBytes: 52,
        blockReadBytes: 15,
        blockWriteBytes: 20
      }
    ]);
  });

  it('reports containers whose stats fail by identity only', async () => {
    const logger = createMockLogger();
    const client = fakeClient(
      [
        { Id: 'gone', Names: ['/old'] },
        { Id: 'c1', Names: ['/web'] }
      ],
      { gone: new Error('container stopped'), c1: STATS }
    );
    const samples = await new DockerMetricsSource(client, logger).collect();

    expect(samples.map((s) => s.containerId)).toEqual(['gone', 'c1']);
    expect(samples[0]).toEqual({ containerId: 'gone', containerName: 'old' });
    expect(safeParseSample(samples[0])).toBeNull();
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'container stats unavailable, skipping',
        context: { containerId: 'gone', error: 'container stopped' }
      }
    ]);
  });

  it('rejects when the container list cannot be read', async () => {
    const client: DockerClient = {
      listRunning: async () => {
        throw new Error('connect ENOENT /var/run/docker.sock');
      },
      oneShotStats: async () => ({})
    };
    await expect(new DockerMetricsSource(client, createMockLogger()).collect()).rejects.toThrow('ENOENT');
  });

  it('builds a dockerode-backed source without connecting', () => {
    expect(DockerMetricsSource.fromSocket('/tmp/test-docker.sock', createMockLogger())).toBeInstanceOf(DockerMetricsSource);
  });
});
