import type { Clock, HealthStatus } from '../core/types.js';
import { systemClock } from '../core/types.js';
import { ContainerState, type ContainerStateSnapshot, type ResourceMetric } from './containerState.js';

export const DEFAULT_HISTORY_CAPACITY = 3;

/**
 * One ContainerState per live container id. Entries are created on the first
 * sample and removed by membership: whatever is absent from a tick's sample
 * set is evicted at the end of that tick.
 */
export class ContainerStateStore {
  private readonly states = new Map<string, ContainerState>();

  constructor(
    readonly historyCapacity: number = DEFAULT_HISTORY_CAPACITY,
    private readonly clock: Clock = systemClock
  ) {}

  upsert(
    containerId: string,
    containerName: string,
    cpuPercent: number,
    ramPercent: number,
    health: HealthStatus = 'none'
  ): ContainerState {
    let state = this.states.get(containerId);
    if (!state) {
      state = new ContainerState(containerId, containerName, this.historyCapacity);
      this.states.set(containerId, state);
    }
    state.containerName = containerName;
    state.recordSample(cpuPercent, ramPercent, health, this.clock.now());
    return state;
  }

  get(containerId: string): ContainerState | undefined {
    return this.states.get(containerId);
  }

  has(containerId: string): boolean {
    return this.states.has(containerId);
  }

  get size(): number {
    return this.states.size;
  }

  ids(): string[] {
    return [...this.states.keys()];
  }

  /** Remove every state whose id is not in `activeIds`; returns the evicted ids. */
  evictNotIn(activeIds: ReadonlySet<string>): string[] {
    const evicted: string[] = [];
    for (const id of this.states.keys()) {
      if (!activeIds.has(id)) evicted.push(id);
    }
    for (const id of evicted) this.states.delete(id);
    return evicted;
  }

  /**
   * End the hysteresis latch for a metric once its latest sample is strictly
   * below the threshold, so a later sustained run can alert again.
   */
  clearAlertIfBelow(containerId: string, metric: ResourceMetric, threshold: number): boolean {
    const state = this.states.get(containerId);
    if (!state || !state.isActive(metric)) return false;
    const latest = state.latest(metric);
    if (latest === undefined || latest >= threshold) return false;
    state.clearActive(metric);
    return true;
  }

  snapshots(): ContainerStateSnapshot[] {
    return [...this.states.values()].map((s) => s.snapshot());
  }

  clear(): void {
    this.states.clear();
  }
}
