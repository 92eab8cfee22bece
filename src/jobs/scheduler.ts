import type { Logger } from '../core/logger.js';

export type ScheduledTask = () => Promise<void>;

export interface ScheduleOptions {
  /** Run once right away instead of waiting for the first interval. */
  runImmediately?: boolean;
}

interface Entry {
  timer: NodeJS.Timeout;
  task: ScheduledTask;
  everyMs: number;
  running: Promise<void> | null;
}

/**
 * Interval scheduler with serialized runs: if a task is still running when
 * its next interval fires, that firing is skipped.
 */
export class Scheduler {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly logger: Logger) {}

  add(name: string, everyMs: number, task: ScheduledTask, options: ScheduleOptions = {}): void {
    if (this.entries.has(name)) {
      throw new Error(`scheduled task already registered: ${name}`);
    }
    const entry: Entry = { timer: this.startTimer(name, everyMs), task, everyMs, running: null };
    this.entries.set(name, entry);
    this.logger.info('scheduled task registered', { name, everyMs });
    if (options.runImmediately) void this.run(name);
  }

  reschedule(name: string, everyMs: number): boolean {
    const entry = this.entries.get(name);
    if (!entry) return false;
    clearInterval(entry.timer);
    entry.timer = this.startTimer(name, everyMs);
    entry.everyMs = everyMs;
    this.logger.info('scheduled task rescheduled', { name, everyMs });
    return true;
  }

  /** Run a task now, honouring the no-overlap rule. Resolves when it settles. */
  async run(name: string): Promise<boolean> {
    const entry = this.entries.get(name);
    if (!entry) return false;
    if (entry.running) {
      this.logger.warn('scheduled task still running, skipping this run', { name });
      return false;
    }
    entry.running = entry
      .task()
      .catch((err: unknown) => {
        this.logger.error('scheduled task failed', {
          name,
          err: String(err),
          stack: err instanceof Error ? err.stack : undefined
        });
      })
      .finally(() => {
        entry.running = null;
      });
    await entry.running;
    return true;
  }

  /** Stop one task's timer and wait for its in-flight run, if any. */
  async remove(name: string): Promise<boolean> {
    const entry = this.entries.get(name);
    if (!entry) return false;
    clearInterval(entry.timer);
    this.entries.delete(name);
    if (entry.running) await entry.running;
    this.logger.info('scheduled task removed', { name });
    return true;
  }

  isRunning(name: string): boolean {
    return this.entries.get(name)?.running != null;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Stop all timers and wait for in-flight runs to settle. */
  async shutdown(): Promise<void> {
    const inFlight: Promise<void>[] = [];
    for (const entry of this.entries.values()) {
      clearInterval(entry.timer);
      if (entry.running) inFlight.push(entry.running);
    }
    this.entries.clear();
    await Promise.allSettled(inFlight);
    this.logger.info('scheduler shutdown complete');
  }

  private startTimer(name: string, everyMs: number): NodeJS.Timeout {
    return setInterval(() => {
      void this.run(name);
    }, everyMs);
  }
}
