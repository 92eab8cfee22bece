import { z } from 'zod';
import { SampleError } from './errors.js';

export const HEALTH_STATUSES = ['healthy', 'unhealthy', 'starting', 'none'] as const;

/** Health as reported by the container runtime. */
export type HealthStatus = (typeof HEALTH_STATUSES)[number];

/** Health as tracked between samples; 'unknown' until the first sample arrives. */
export type TrackedHealth = HealthStatus | 'unknown';

export interface ContainerSample {
  containerId: string;
  containerName: string;
  cpuPercent: number;
  ramPercent: number;
  healthStatus: HealthStatus;
  memoryUsageBytes?: number;
  memoryLimitBytes?: number;
  networkRxBytes?: number;
  networkTxBytes?: number;
  blockReadBytes?: number;
  blockWriteBytes?: number;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

const byteCount = z.number().finite().nonnegative().optional();

const sampleSchema = z.object({
  containerId: z.string().min(1),
  containerName: z.string().min(1),
  // Multi-core hosts report CPU above 100, so only the lower bound is enforced.
  cpuPercent: z.number().finite().nonnegative(),
  ramPercent: z.number().finite().nonnegative(),
  healthStatus: z.enum(HEALTH_STATUSES).default('none'),
  memoryUsageBytes: byteCount,
  memoryLimitBytes: byteCount,
  networkRxBytes: byteCount,
  networkTxBytes: byteCount,
  blockReadBytes: byteCount,
  blockWriteBytes: byteCount
});

export const parseSample = (raw: unknown): ContainerSample => {
  const parsed = sampleSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new SampleError(`Invalid container sample: ${details.join('; ')}`, {
      containerId: sampleIdOf(raw),
      issues: details
    });
  }
  return parsed.data;
};

/** Null instead of throwing, for callers that only drop invalid samples. */
export const safeParseSample = (raw: unknown): ContainerSample | null => {
  const parsed = sampleSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
};

/** Best-effort id of a sample that may have failed validation. */
export const sampleIdOf = (raw: unknown): string | undefined => {
  if (typeof raw !== 'object' || raw === null || !('containerId' in raw)) return undefined;
  const id = raw.containerId;
  return typeof id === 'string' && id.length > 0 ? id : undefined;
};
