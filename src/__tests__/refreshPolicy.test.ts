import { describe, expect, it, jest } from '@jest/globals';
import { INTERVAL_BOUNDS } from 'App/config/config';
import { MIN_TICK_MS, RefreshPolicy } from 'App/services/RefreshPolicy';

describe('RefreshPolicy', () => {
  it('starts with every category due', () => {
    const policy = new RefreshPolicy();
    expect(policy.isDue('cpu', 0)).toBe(true);
    expect(policy.isDue('temperature', 0)).toBe(true);
    expect(policy.getLastSampled('disk')).toBe(Number.NEGATIVE_INFINITY);
  });

  it('is due once the interval has fully elapsed since the last sample', () => {
    const policy = new RefreshPolicy({ cpu: 2 });
    policy.markSampled('cpu', 10_000);

    expect(policy.isDue('cpu', 10_000)).toBe(false);
    expect(policy.isDue('cpu', 11_999)).toBe(false);
    expect(policy.isDue('cpu', 12_000)).toBe(true);
  });

  it('clamps and rounds intervals to the category bounds', () => {
    const policy = new RefreshPolicy();

    expect(policy.setIntervalSeconds('cpu', 0)).toBe(1);
    expect(policy.setIntervalSeconds('disk', 500)).toBe(60);
    expect(policy.setIntervalSeconds('process', 2.6)).toBe(3);
    expect(policy.setIntervalSeconds('temperature', -4)).toBe(2);
    expect(policy.getInterval('disk')).toBe(60);
  });

  it('clamps initial intervals too', () => {
    const policy = new RefreshPolicy({ memory: 1000 });
    expect(policy.getInterval('memory')).toBe(INTERVAL_BOUNDS.memory.max);
  });

  it('makes a category due again as soon as its interval changes', () => {
    const policy = new RefreshPolicy({ network: 10 });
    policy.markSampled('network', 5_000);
    expect(policy.isDue('network', 6_000)).toBe(false);

    policy.setIntervalSeconds('network', 20);

    expect(policy.isDue('network', 6_000)).toBe(true);
  });

  it('emits a single change for a batch update and none for an empty one', () => {
    const policy = new RefreshPolicy();
    const listener = jest.fn();
    policy.on('change', listener);

    const applied = policy.update({ cpu: 5, memory: 7 });
    policy.update({});

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(applied);
    expect(applied.cpu).toBe(5);
    expect(applied.memory).toBe(7);
  });

  it('ticks at the finest interval, never faster than once a second', () => {
    const coarse = new RefreshPolicy({
      cpu: 5,
      memory: 5,
      disk: 10,
      network: 4,
      process: 10,
      gpu: 6,
      temperature: 10,
    });
    expect(coarse.tickPeriodMs()).toBe(4000);

    coarse.setIntervalSeconds('cpu', 1);
    expect(coarse.tickPeriodMs()).toBe(MIN_TICK_MS);
  });

  it('describes each category with its bounds in emission order', () => {
    const view = new RefreshPolicy({ gpu: 4 }).describe();

    expect(view.map(v => v.category)).toEqual([
      'cpu',
      'memory',
      'disk',
      'network',
      'process',
      'gpu',
      'temperature',
    ]);
    expect(view[5]).toEqual({ category: 'gpu', seconds: 4, bounds: { min: 1, max: 30 } });
  });
});
