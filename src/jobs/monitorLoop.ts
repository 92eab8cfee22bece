import type { DeliveryReport, NotificationRouter } from '../alerts/notificationRouter.js';
import { errorContext, type Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { safeParseSample, systemClock, type Clock, type ContainerSample } from '../core/types.js';
import type { MetricsSource } from '../data/dockerMetricsSource.js';
import type { SampleRecorder } from '../data/historyStore.js';
import type { AlertEngine, TickResult } from './alertEngine.js';
import type { Scheduler } from './scheduler.js';

export const MONITOR_TASK = 'monitor-tick';

export interface MonitorTickOutcome {
  /** Null when collection failed and no tick ran. */
  result: TickResult | null;
  notified: boolean;
  deliveries: DeliveryReport[];
}

export interface MonitorLoopDeps {
  source: MetricsSource;
  engine: AlertEngine;
  router: NotificationRouter;
  /** Optional long-term history; failures here never block alerting. */
  history?: SampleRecorder;
  scheduler: Scheduler;
  logger: Logger;
  metrics: Metrics;
  clock?: Clock;
}

/** Collect → record → detect → notify, once per interval. */
export class MonitorLoop {
  private readonly clock: Clock;

  constructor(private readonly deps: MonitorLoopDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  start(intervalMs: number): void {
    this.deps.scheduler.add(
      MONITOR_TASK,
      intervalMs,
      async () => {
        await this.tick();
      },
      { runImmediately: true }
    );
  }

  /** Resolves once any tick in progress has finished. */
  async stop(): Promise<void> {
    await this.deps.scheduler.remove(MONITOR_TASK);
  }

  async tick(): Promise<MonitorTickOutcome> {
    const { source, engine, router, logger, metrics } = this.deps;

    let raw: unknown[];
    try {
      raw = await source.collect();
    } catch (err) {
      metrics.increment('collect.failed');
      logger.error('metrics collection failed, skipping tick', errorContext(err));
      return { result: null, notified: false, deliveries: [] };
    }

    await this.record(raw);

    const result = engine.tick(raw);
    if (!engine.shouldNotify(result.batch, result.policy)) {
      return { result, notified: false, deliveries: [] };
    }

    // Delivery outcomes are reported, never fed back into detection state.
    const deliveries = await router.dispatch(result.batch, result.policy);
    const failed = deliveries.filter((d) => !d.ok);
    if (failed.length > 0) {
      metrics.increment('notifications.failed', failed.length);
    }
    logger.info('alerts dispatched', {
      critical: result.batch.critical.length,
      warning: result.batch.warning.length,
      recovery: result.batch.recovery.length,
      deliveries: deliveries.length,
      failed: failed.length
    });
    return { result, notified: true, deliveries };
  }

  private async record(raw: readonly unknown[]): Promise<void> {
    const { history, logger } = this.deps;
    if (!history) return;

    // The engine logs rejected samples; history just leaves them out.
    const valid = raw.map(safeParseSample).filter((s): s is ContainerSample => s !== null);
    if (valid.length === 0) return;

    try {
      await history.recordSamples(valid, this.clock.now());
    } catch (err) {
      logger.warn('history write failed', errorContext(err));
    }
  }
}
