import fs from 'node:fs';
import path from 'node:path';
import { ConsoleNotificationSink } from './alerts/console.js';
import { DiscordNotificationSink } from './alerts/discord.js';
import { EmailNotificationSink } from './alerts/email.js';
import { NotificationRouter } from './alerts/notificationRouter.js';
import { loadConfig } from './config/load.js';
import { AlertPolicyProvider } from './config/policyProvider.js';
import { errorContext, JsonLogger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { AlertStore } from './data/alertStore.js';
import { DockerMetricsSource } from './data/dockerMetricsSource.js';
import { HistoryStore } from './data/historyStore.js';
import { AlertDetector } from './detection/alertDetector.js';
import { AlertEngine } from './jobs/alertEngine.js';
import { MonitorLoop } from './jobs/monitorLoop.js';
import { Scheduler } from './jobs/scheduler.js';
import { ContainerStateStore } from './state/stateStore.js';

const main = async (): Promise<void> => {
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel);
  const metrics = new InMemoryMetrics();

  const policies = AlertPolicyProvider.fromFile(config.alertsConfigPath, logger);

  // Window size is fixed for the life of the process; reloads change
  // thresholds and cooldowns only.
  const historyCapacity = policies.current().historyCapacity(config.pollIntervalMs);
  const store = new ContainerStateStore(historyCapacity);
  const detector = new AlertDetector(store);
  const engine = new AlertEngine(policies, store, detector, logger.child({ component: 'engine' }), metrics);

  const alertStore = new AlertStore();
  const router = new NotificationRouter(
    [new ConsoleNotificationSink(), new EmailNotificationSink(), new DiscordNotificationSink()],
    alertStore,
    logger.child({ component: 'notifications' }),
    metrics
  );

  let history: HistoryStore | undefined;
  if (config.history.enabled) {
    fs.mkdirSync(path.dirname(config.history.dbPath), { recursive: true });
    history = new HistoryStore(config.history.dbPath);
  }

  const scheduler = new Scheduler(logger.child({ component: 'scheduler' }));
  const loop = new MonitorLoop({
    source: DockerMetricsSource.fromSocket(config.docker.socketPath, logger.child({ component: 'docker' })),
    engine,
    router,
    history,
    scheduler,
    logger: logger.child({ component: 'monitor' }),
    metrics
  });

  logger.info('container watch starting', {
    pollIntervalMs: config.pollIntervalMs,
    historyCapacity,
    channels: router.channelNames,
    history: history ? config.history.dbPath : null
  });

  loop.start(config.pollIntervalMs);

  if (history) {
    const db = history;
    scheduler.add('history-cleanup', config.history.cleanupIntervalMs, async () => {
      const removed = await db.prune(config.history.retentionDays);
      logger.info('history cleanup complete', { removed, retentionDays: config.history.retentionDays });
    });
  }

  if (config.reloadOnSighup) {
    process.on('SIGHUP', () => {
      try {
        policies.reload();
      } catch (err) {
        // Provider already logged; the previous policy stays active.
        metrics.increment('config.reload_failed');
        logger.debug('reload failure detail', errorContext(err));
      }
    });
  }

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info('shutdown initiated', { signal });
    void scheduler
      .shutdown()
      .then(() => {
        history?.close();
        logger.info('shutdown complete', { metrics: metrics.snapshot() });
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error('shutdown failed', errorContext(err));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

void main().catch((err) => {
  process.stderr.write(`Fatal startup error: ${String(err)}\n`);
  process.exit(1);
});
