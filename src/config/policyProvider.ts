import type { Logger } from '../core/logger.js';
import { AlertPolicy, loadAlertPolicy } from './alertPolicy.js';

export type PolicyLoader = () => AlertPolicy;

/**
 * Holds the active alert policy. Readers take `current()` once per tick;
 * `reload()` builds a complete new policy before swapping the reference.
 */
export class AlertPolicyProvider {
  private policy: AlertPolicy;

  constructor(
    private readonly loader: PolicyLoader,
    private readonly logger: Logger
  ) {
    // A bad policy at startup is fatal; let the ConfigError propagate.
    this.policy = loader();
    this.logger.info('alert policy loaded', this.describe());
  }

  static fromFile(path: string, logger: Logger, env: NodeJS.ProcessEnv = process.env): AlertPolicyProvider {
    return new AlertPolicyProvider(() => loadAlertPolicy(path, env), logger.child({ configPath: path }));
  }

  current(): AlertPolicy {
    return this.policy;
  }

  /** Swap in a freshly loaded policy. On failure the previous policy stays active. */
  reload(): AlertPolicy {
    let next: AlertPolicy;
    try {
      next = this.loader();
    } catch (err) {
      this.logger.error('alert policy reload rejected, keeping previous policy', {
        err: err instanceof Error ? err.message : String(err)
      });
      throw err;
    }
    this.policy = next;
    this.logger.info('alert policy reloaded', this.describe());
    return next;
  }

  private describe(): Record<string, unknown> {
    const { data } = this.policy;
    return {
      enabled: this.policy.isEnabled(),
      cpuPercent: data.thresholds.cpu_percent,
      ramPercent: data.thresholds.ram_percent,
      durationMinutes: data.thresholds.duration_minutes,
      cooldownMinutes: data.alerts.cooldown_minutes,
      recoveryCooldownMinutes: data.alerts.recovery_cooldown_minutes,
      containerRules: data.container_rules.length
    };
  }
}
