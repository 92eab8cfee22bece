import type { HealthStatus, TrackedHealth } from '../core/types.js';
import { RingBuffer } from './ringBuffer.js';

/** Resource metrics with a sustained-threshold window. */
export type ResourceMetric = 'cpu' | 'ram';

/** Independent cooldown clocks kept per container. */
export type CooldownKind = ResourceMetric | 'health' | 'recovery';

/** Conditions with a hysteresis latch. Recovery has a cooldown but no latch. */
export type LatchKind = ResourceMetric | 'health';

export interface ContainerStateSnapshot {
  containerId: string;
  containerName: string;
  cpuHistory: number[];
  ramHistory: number[];
  currentHealth: TrackedHealth;
  previousHealth: TrackedHealth;
  unhealthySince: number | null;
  active: Record<LatchKind, boolean>;
  lastAlertAt: Record<CooldownKind, number | null>;
  lastUpdate: number | null;
}

/**
 * Rolling state of one monitored container: the recent CPU/RAM window,
 * the last two health readings, and per-kind alert bookkeeping.
 */
export class ContainerState {
  readonly cpuHistory: RingBuffer<number>;
  readonly ramHistory: RingBuffer<number>;

  private current: TrackedHealth = 'unknown';
  private previous: TrackedHealth = 'unknown';
  private unhealthyAt: number | null = null;
  private recoveredAfterMs: number | null = null;
  private updatedAt: number | null = null;

  private readonly active: Record<LatchKind, boolean> = { cpu: false, ram: false, health: false };
  private readonly lastAlertAt: Record<CooldownKind, number | null> = {
    cpu: null,
    ram: null,
    health: null,
    recovery: null
  };

  constructor(
    readonly containerId: string,
    public containerName: string,
    historyCapacity: number
  ) {
    this.cpuHistory = new RingBuffer<number>(historyCapacity);
    this.ramHistory = new RingBuffer<number>(historyCapacity);
  }

  get currentHealth(): TrackedHealth {
    return this.current;
  }

  get previousHealth(): TrackedHealth {
    return this.previous;
  }

  get unhealthySince(): number | null {
    return this.unhealthyAt;
  }

  get lastUpdate(): number | null {
    return this.updatedAt;
  }

  recordSample(cpuPercent: number, ramPercent: number, health: HealthStatus, now: number): void {
    this.cpuHistory.push(cpuPercent);
    this.ramHistory.push(ramPercent);
    this.updateHealth(health, now);
    this.updatedAt = now;
  }

  private updateHealth(health: HealthStatus, now: number): void {
    this.previous = this.current;
    this.current = health;
    this.recoveredAfterMs = null;

    if (health === 'unhealthy' && this.previous !== 'unhealthy') {
      this.unhealthyAt = now;
    } else if (health === 'healthy') {
      if (this.previous === 'unhealthy' && this.unhealthyAt !== null) {
        this.recoveredAfterMs = Math.max(0, now - this.unhealthyAt);
      }
      this.unhealthyAt = null;
    }
  }

  /** Health moved between two known readings. */
  hasHealthChanged(): boolean {
    return this.current !== this.previous && this.previous !== 'unknown';
  }

  isUnhealthyTransition(): boolean {
    return this.current === 'unhealthy' && (this.previous === 'healthy' || this.previous === 'starting');
  }

  isRecoveryTransition(): boolean {
    return this.current === 'healthy' && this.previous === 'unhealthy';
  }

  /**
   * Time spent unhealthy, measured when the latest reading recovered.
   * Null outside a recovery transition or when the start was never seen.
   */
  downtimeMs(): number | null {
    return this.isRecoveryTransition() ? this.recoveredAfterMs : null;
  }

  /** Full window with every sample at or above the threshold. */
  isSustainedAbove(metric: ResourceMetric, threshold: number): boolean {
    const history = this.history(metric);
    if (!history.isFull) return false;
    return history.every((value) => value >= threshold);
  }

  history(metric: ResourceMetric): RingBuffer<number> {
    return metric === 'cpu' ? this.cpuHistory : this.ramHistory;
  }

  latest(metric: ResourceMetric): number | undefined {
    return this.history(metric).latest();
  }

  isActive(kind: LatchKind): boolean {
    return this.active[kind];
  }

  isInCooldown(kind: CooldownKind, cooldownMs: number, now: number): boolean {
    const last = this.lastAlertAt[kind];
    if (last === null) return false;
    return now - last < cooldownMs;
  }

  /** Stamp the cooldown clock and, for latched kinds, raise the latch. */
  markAlerted(kind: CooldownKind, now: number): void {
    this.lastAlertAt[kind] = now;
    if (kind !== 'recovery') this.active[kind] = true;
  }

  clearActive(kind: LatchKind): void {
    this.active[kind] = false;
  }

  lastAlert(kind: CooldownKind): number | null {
    return this.lastAlertAt[kind];
  }

  snapshot(): ContainerStateSnapshot {
    return {
      containerId: this.containerId,
      containerName: this.containerName,
      cpuHistory: this.cpuHistory.toArray(),
      ramHistory: this.ramHistory.toArray(),
      currentHealth: this.current,
      previousHealth: this.previous,
      unhealthySince: this.unhealthyAt,
      active: { ...this.active },
      lastAlertAt: { ...this.lastAlertAt },
      lastUpdate: this.updatedAt
    };
  }
}
