import { beforeEach, describe, expect, it } from 'vitest';
import { AlertDetector } from '../../src/detection/alertDetector.js';
import { ContainerStateStore } from '../../src/state/stateStore.js';
import type { HealthStatus } from '../../src/core/types.js';
import type { AlertEvent } from '../../src/alerts/types.js';
import { ManualClock, makePolicy, MINUTE, T0 } from '../helpers.js';

describe('AlertDetector', () => {
  let clock: ManualClock;
  let store: ContainerStateStore;
  let detector: AlertDetector;
  const policy = makePolicy();

  /** Record one sample at the current clock, evaluate, then advance a minute. */
  const step = (cpu: number, ram = 10, health: HealthStatus = 'healthy', name = 'web'): AlertEvent[] => {
    const state = store.upsert('c1', name, cpu, ram, health);
    const events = detector.evaluate(state, policy, clock.now());
    clock.advance(MINUTE);
    return events;
  };

  beforeEach(() => {
    clock = new ManualClock();
    store = new ContainerStateStore(3, clock);
    detector = new AlertDetector(store);
  });

  describe('resource alerts', () => {
    it('fires on the sample that completes a sustained window', () => {
      expect(step(85)).toEqual([]);
      expect(step(90)).toEqual([]);
      const events = step(95);

      expect(events).toEqual([
        {
          containerId: 'c1',
          containerName: 'web',
          kind: 'high_cpu',
          severity: 'warning',
          value: 95,
          history: [85, 90, 95],
          threshold: 80,
          timestamp: T0 + 2 * MINUTE
        }
      ]);
    });

    it('does not fire when any sample in the window dips', () => {
      expect([...step(85), ...step(90), ...step(70)]).toEqual([]);
    });

    it('fires ram independently of cpu', () => {
      step(10, 81);
      step(10, 82);
      const events = step(10, 83);
      expect(events.map((e) => e.kind)).toEqual(['high_ram']);
    });

    it('stays latched while usage remains high, even past the cooldown', () => {
      step(85);
      step(90);
      expect(step(95)).toHaveLength(1);
      for (let i = 0; i < 20; i += 1) {
        expect(step(99)).toEqual([]);
      }
    });

    it('re-arms after usage drops below the threshold and the cooldown passes', () => {
      step(85);
      step(90);
      expect(step(95)).toHaveLength(1); // T0 + 2m
      step(50); // clears the latch

      const state = store.get('c1');
      expect(state?.isActive('cpu')).toBe(false);

      // Sustained again at T0+6m, still inside the 15 minute cooldown.
      step(85);
      step(85);
      expect(step(85)).toEqual([]);

      clock.current = T0 + 17 * MINUTE;
      const events = step(85);
      expect(events.map((e) => e.kind)).toEqual(['high_cpu']);
    });

    it('uses per-container threshold overrides', () => {
      const custom = makePolicy({ container_rules: [{ name: 'batch', cpu_threshold: 98 }] });
      const run = (cpu: number): AlertEvent[] => {
        const state = store.upsert('c1', 'batch', cpu, 10, 'healthy');
        return detector.evaluate(state, custom, clock.now());
      };
      run(95);
      run(96);
      expect(run(97)).toEqual([]);
    });
  });

  describe('health alerts', () => {
    it('fires unhealthy on a transition from healthy', () => {
      step(10, 10, 'healthy');
      const events = step(10, 10, 'unhealthy');
      expect(events).toEqual([
        { containerId: 'c1', containerName: 'web', kind: 'unhealthy', severity: 'critical', timestamp: T0 + MINUTE }
      ]);
      expect(store.get('c1')?.isActive('health')).toBe(true);
    });

    it('does not repeat while the container stays unhealthy', () => {
      step(10, 10, 'healthy');
      step(10, 10, 'unhealthy');
      expect(step(10, 10, 'unhealthy')).toEqual([]);
    });

    it('reports recovery with whole-minute downtime', () => {
      step(10, 10, 'healthy');
      step(10, 10, 'unhealthy'); // T0 + 1m
      clock.current = T0 + 11 * MINUTE + 30_000;
      const events = step(10, 10, 'healthy');

      expect(events).toHaveLength(1);
      const [recovery] = events;
      expect(recovery?.kind).toBe('recovery');
      if (recovery?.kind === 'recovery') {
        expect(recovery.downtimeMs).toBe(10 * MINUTE + 30_000);
        expect(recovery.downtime).toBe('10 minutes');
        expect(recovery.severity).toBe('info');
      }
      expect(store.get('c1')?.isActive('health')).toBe(false);
    });

    it('measures downtime from a first reading that was already unhealthy', () => {
      // unknown -> unhealthy raises no alert but still records the start.
      expect(step(10, 10, 'unhealthy')).toEqual([]);
      const events = step(10, 10, 'healthy');
      expect(events).toHaveLength(1);
      const [recovery] = events;
      expect(recovery?.kind === 'recovery' && recovery.downtime).toBe('1 minutes');
    });

    it('suppresses a second recovery inside the recovery cooldown', () => {
      step(10, 10, 'healthy'); // 0
      step(10, 10, 'unhealthy'); // 1
      expect(step(10, 10, 'healthy')).toHaveLength(1); // 2: recovery
      step(10, 10, 'unhealthy'); // 3: suppressed by health cooldown
      expect(step(10, 10, 'healthy')).toEqual([]); // 4: inside 5m recovery cooldown
    });

    it('gates repeated unhealthy alerts by cooldown alone', () => {
      step(10, 10, 'healthy'); // 0
      expect(step(10, 10, 'unhealthy')).toHaveLength(1); // 1
      step(10, 10, 'healthy'); // 2: recovery clears the latch
      expect(step(10, 10, 'unhealthy')).toEqual([]); // 3: within 15m of the first

      clock.current = T0 + 20 * MINUTE;
      step(10, 10, 'healthy'); // 20
      expect(step(10, 10, 'unhealthy').map((e) => e.kind)).toEqual(['unhealthy']); // 21
    });

    it('orders health events before resource events', () => {
      step(90, 10, 'healthy');
      step(90, 10, 'healthy');
      const events = step(90, 10, 'unhealthy');
      expect(events.map((e) => e.kind)).toEqual(['unhealthy', 'high_cpu']);
    });
  });
});
