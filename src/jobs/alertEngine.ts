import type { AlertPolicy } from '../config/alertPolicy.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { parseSample, sampleIdOf, systemClock, type Clock, type ContainerSample } from '../core/types.js';
import type { AlertDetector } from '../detection/alertDetector.js';
import type { ContainerStateStore } from '../state/stateStore.js';
import { createAlertBatch, type AlertBatch, type AlertEvent } from '../alerts/types.js';

export interface PolicySource {
  current(): AlertPolicy;
}

export interface TickResult {
  batch: AlertBatch;
  /** Policy snapshot the tick was evaluated against. */
  policy: AlertPolicy;
  evaluated: number;
  skipped: number;
  rejected: number;
  evicted: string[];
}

/**
 * One sampling tick: update state, detect, evict what disappeared, and
 * partition the events into a batch.
 */
export class AlertEngine {
  constructor(
    private readonly policies: PolicySource,
    private readonly store: ContainerStateStore,
    private readonly detector: AlertDetector,
    private readonly logger: Logger,
    private readonly metrics: Metrics,
    private readonly clock: Clock = systemClock
  ) {}

  runTick(samples: readonly unknown[]): AlertBatch {
    return this.tick(samples).batch;
  }

  tick(samples: readonly unknown[]): TickResult {
    const policy = this.policies.current();
    const events: AlertEvent[] = [];
    const present = new Set<string>();
    let evaluated = 0;
    let skipped = 0;
    let rejected = 0;

    for (const raw of samples) {
      try {
        const sample = parseSample(raw);

        // Disabled containers keep no state; anything left from before the
        // rule was added is evicted with the absent ones.
        if (policy.isContainerDisabled(sample.containerName)) {
          skipped += 1;
          continue;
        }

        present.add(sample.containerId);
        events.push(...this.evaluateSample(sample, policy));
        evaluated += 1;
      } catch (err) {
        // A rejected sample still marks its container present, so its
        // existing state survives the eviction pass below.
        const rawId = sampleIdOf(raw);
        if (rawId) present.add(rawId);
        rejected += 1;
        this.metrics.increment('samples.rejected');
        this.logger.warn('container evaluation failed, skipping for this tick', {
          containerId: rawId,
          err: err instanceof Error ? err.message : String(err)
        });
      }
    }

    const evicted = this.store.evictNotIn(present);
    if (evicted.length > 0) {
      this.logger.debug('evicted state for vanished containers', { containerIds: evicted });
    }

    const batch = createAlertBatch(events, this.clock.now());

    this.metrics.increment('ticks');
    for (const event of events) this.metrics.increment(`alerts.${event.kind}`);
    this.metrics.gauge('containers.tracked', this.store.size);

    this.logger.debug('tick complete', {
      samples: samples.length,
      evaluated,
      skipped,
      rejected,
      evicted: evicted.length,
      critical: batch.critical.length,
      warning: batch.warning.length,
      recovery: batch.recovery.length
    });

    return { batch, policy, evaluated, skipped, rejected, evicted };
  }

  /** Global switches on and something to say. */
  shouldNotify(batch: AlertBatch, policy: AlertPolicy = this.policies.current()): boolean {
    if (!policy.isEnabled()) return false;
    return batch.hasActionable || batch.hasRecovery;
  }

  private evaluateSample(sample: ContainerSample, policy: AlertPolicy): AlertEvent[] {
    const state = this.store.upsert(
      sample.containerId,
      sample.containerName,
      sample.cpuPercent,
      sample.ramPercent,
      sample.healthStatus
    );
    return this.detector.evaluate(state, policy, this.clock.now());
  }
}
