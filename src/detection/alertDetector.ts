import type { AlertPolicy } from '../config/alertPolicy.js';
import type { ContainerState, ResourceMetric } from '../state/containerState.js';
import type { ContainerStateStore } from '../state/stateStore.js';
import {
  recoveryAlert,
  resourceAlert,
  unhealthyAlert,
  type AlertEvent,
  type ResourceAlert
} from '../alerts/types.js';

const RESOURCE_KIND: Record<ResourceMetric, ResourceAlert['kind']> = {
  cpu: 'high_cpu',
  ram: 'high_ram'
};

/**
 * Decides which alerts one container's freshly updated state warrants.
 * Must run after the tick's sample has been recorded into `state`.
 */
export class AlertDetector {
  constructor(private readonly store: ContainerStateStore) {}

  evaluate(state: ContainerState, policy: AlertPolicy, nowMs: number): AlertEvent[] {
    const events: AlertEvent[] = [];

    // ── 1. Health transitions: recovery first, else unhealthy ───
    const health = this.checkHealth(state, policy, nowMs);
    if (health) events.push(health);

    // ── 2. Sustained resource usage, independent of health ──────
    for (const metric of ['cpu', 'ram'] as const) {
      const threshold = metric === 'cpu'
        ? policy.cpuThreshold(state.containerName)
        : policy.ramThreshold(state.containerName);
      const event = this.checkResource(state, metric, threshold, policy.cooldownMs, nowMs);
      if (event) events.push(event);
    }

    return events;
  }

  private checkHealth(state: ContainerState, policy: AlertPolicy, nowMs: number): AlertEvent | null {
    if (state.isRecoveryTransition()) {
      if (state.isInCooldown('recovery', policy.recoveryCooldownMs, nowMs)) return null;
      state.markAlerted('recovery', nowMs);
      state.clearActive('health');
      return recoveryAlert(state, state.downtimeMs(), nowMs);
    }

    if (state.isUnhealthyTransition()) {
      // Gated by cooldown only; the health latch is bookkeeping and does not
      // suppress a new unhealthy alert.
      if (state.isInCooldown('health', policy.cooldownMs, nowMs)) return null;
      state.markAlerted('health', nowMs);
      return unhealthyAlert(state, nowMs);
    }

    return null;
  }

  private checkResource(
    state: ContainerState,
    metric: ResourceMetric,
    threshold: number,
    cooldownMs: number,
    nowMs: number
  ): AlertEvent | null {
    if (!state.isSustainedAbove(metric, threshold)) {
      this.store.clearAlertIfBelow(state.containerId, metric, threshold);
      return null;
    }
    if (state.isActive(metric) || state.isInCooldown(metric, cooldownMs, nowMs)) return null;

    const value = state.latest(metric);
    if (value === undefined) return null;

    state.markAlerted(metric, nowMs);
    return resourceAlert(RESOURCE_KIND[metric], state, value, state.history(metric).toArray(), threshold, nowMs);
  }
}
