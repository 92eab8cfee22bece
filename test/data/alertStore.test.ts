import { describe, expect, it } from 'vitest';
import { AlertStore } from '../../src/data/alertStore.js';
import { recoveryAlert, resourceAlert, unhealthyAlert } from '../../src/alerts/types.js';
import { MINUTE, T0 } from '../helpers.js';

const api = { containerId: 'aaa', containerName: 'api' };
const worker = { containerId: 'bbb', containerName: 'worker' };

const seeded = (): AlertStore => {
  const store = new AlertStore();
  store.push(unhealthyAlert(api, T0));
  store.push(resourceAlert('high_cpu', worker, 95, [90, 92, 95], 80, T0 + MINUTE));
  store.push(recoveryAlert(api, 2 * MINUTE, T0 + 2 * MINUTE));
  return store;
};

describe('AlertStore', () => {
  it('assigns increasing ids and keeps the record form', () => {
    const entry = new AlertStore().push(unhealthyAlert(api, T0));
    expect(entry).toEqual({
      id: 1,
      at: T0,
      container_id: 'aaa',
      container_name: 'api',
      alert_type: 'unhealthy',
      priority: 'critical',
      value: null,
      timestamp: '2026-01-01T00:00:00.000Z',
      history: null,
      downtime: null
    });
  });

  it('returns recent entries newest first', () => {
    const store = seeded();
    expect(store.getRecent().map((e) => e.id)).toEqual([3, 2, 1]);
    expect(store.getRecent(2).map((e) => e.id)).toEqual([3, 2]);
  });

  it('filters by container, severity, kind and time', () => {
    const store = seeded();
    expect(store.getByContainer('aaa').map((e) => e.alert_type)).toEqual(['recovery', 'unhealthy']);
    expect(store.getBySeverity('warning').map((e) => e.container_name)).toEqual(['worker']);
    expect(store.getByKind('recovery').map((e) => e.downtime)).toEqual(['2 minutes']);
    expect(store.getSince(T0 + MINUTE).map((e) => e.id)).toEqual([3, 2]);
  });

  it('drops the oldest entry past its size', () => {
    const store = new AlertStore(2);
    store.push(unhealthyAlert(api, T0));
    store.push(unhealthyAlert(worker, T0));
    store.push(unhealthyAlert(api, T0 + 1));
    expect(store.size).toBe(2);
    expect(store.getRecent().map((e) => e.id)).toEqual([3, 2]);
  });

  it('clears', () => {
    const store = seeded();
    store.clear();
    expect(store.size).toBe(0);
  });
});
