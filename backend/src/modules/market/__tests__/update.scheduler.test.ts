/**
 * Update Scheduler tests
 *
 * Timer-driven ticks, failure isolation, unseeded skips and shutdown.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { MarketState } from '../services/market.state.js';
import { UpdateScheduler } from '../services/update.scheduler.js';
import type { DriftFn } from '../../curve/services/curve.drift.js';
import { FIXED_CLOCK, PARAMS, POSITIONS, levelShift, mockLogger } from './fixtures.js';

function setup(drift: DriftFn = levelShift(1), onTickError?: (err: unknown, tick: number) => void) {
  const logger = mockLogger();
  const state = new MarketState({ logger, clock: FIXED_CLOCK });
  const scheduler = new UpdateScheduler(state, {
    intervalMs: 500,
    drift,
    logger,
    clock: FIXED_CLOCK,
    onTickError,
  });
  return { state, scheduler, logger };
}

describe('UpdateScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should publish one tick per interval', async () => {
    const { state, scheduler } = setup();
    state.seed(PARAMS, POSITIONS);

    expect(scheduler.start()).toBe(true);
    await vi.advanceTimersByTimeAsync(499);
    expect(state.snapshot().tick).toBe(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(state.snapshot().tick).toBe(1);

    await vi.advanceTimersByTimeAsync(1000);
    const snapshot = state.snapshot();
    expect(snapshot.tick).toBe(3);
    expect(snapshot.source).toBe('tick');
    expect(snapshot.sod).toEqual(PARAMS);
    expect(snapshot.live.lambda).toBe(PARAMS.lambda);
    // 3 x 1bp on a 500 DV01 10Y bucket
    expect(snapshot.positions[0].pnl).toBe(1500);
    expect(scheduler.getStats()).toMatchObject({ running: true, ticks: 3, failures: 0 });

    await scheduler.stop();
  });

  it('should not start twice', async () => {
    const { state, scheduler } = setup();
    state.seed(PARAMS, POSITIONS);
    expect(scheduler.start()).toBe(true);
    expect(scheduler.start()).toBe(false);
    await scheduler.stop();
  });

  it('should seal the state against a late seed', async () => {
    const { state, scheduler } = setup();
    scheduler.start();
    expect(() => state.seed(PARAMS, POSITIONS)).toThrow(expect.objectContaining({ code: 'SEALED' }));
    await scheduler.stop();
  });

  it('should skip ticks while the state is not seeded', async () => {
    const { scheduler, logger } = setup();
    scheduler.start();

    await vi.advanceTimersByTimeAsync(1000);

    expect(scheduler.getStats()).toMatchObject({ ticks: 0, skipped: 2 });
    expect(logger.warn).toHaveBeenCalledWith({}, 'Market state not seeded, skipping update');
    await scheduler.stop();
  });

  it('should keep the last snapshot when a tick fails and carry on', async () => {
    let calls = 0;
    const shift = levelShift(1);
    const drift: DriftFn = (params) => {
      calls++;
      if (calls === 2) throw new Error('drift boom');
      return shift(params);
    };
    const onTickError = vi.fn();
    const { state, scheduler, logger } = setup(drift, onTickError);
    state.seed(PARAMS, POSITIONS);
    scheduler.start();

    await vi.advanceTimersByTimeAsync(1000);
    expect(state.snapshot().tick).toBe(1);
    expect(logger.error).toHaveBeenCalledWith({ err: 'drift boom' }, 'Tick failed, keeping last snapshot');
    expect(onTickError).toHaveBeenCalledWith(expect.any(Error), 2);

    await vi.advanceTimersByTimeAsync(500);
    expect(state.snapshot().tick).toBe(2);
    expect(scheduler.getStats()).toMatchObject({ ticks: 2, failures: 1, lastError: 'drift boom' });

    await scheduler.stop();
  });

  it('should survive a throwing error hook', async () => {
    const { state, scheduler, logger } = setup(
      () => {
        throw new Error('drift boom');
      },
      () => {
        throw new Error('hook boom');
      }
    );
    state.seed(PARAMS, POSITIONS);
    scheduler.start();

    await vi.advanceTimersByTimeAsync(1000);

    expect(scheduler.getStats()).toMatchObject({ failures: 2 });
    expect(logger.error).toHaveBeenCalledWith({ err: 'hook boom' }, 'Tick error hook failed');
    await scheduler.stop();
  });

  it('should stop ticking after stop()', async () => {
    const { state, scheduler } = setup();
    state.seed(PARAMS, POSITIONS);
    scheduler.start();
    await vi.advanceTimersByTimeAsync(500);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(2000);

    expect(state.snapshot().tick).toBe(1);
    expect(scheduler.isRunning()).toBe(false);
  });

  it('should run a single step on demand', () => {
    const { state, scheduler } = setup(levelShift(5));
    state.seed(PARAMS, POSITIONS);

    const next = scheduler.tick();

    expect(next.tick).toBe(1);
    expect(state.snapshot()).toBe(next);
    expect(next.positions.map((p) => p.pnl)).toEqual([2500, -11000]);
    expect(next.positions.map((p) => p.pvLive)).toEqual([9_987_500, -11_951_000]);
  });
});
