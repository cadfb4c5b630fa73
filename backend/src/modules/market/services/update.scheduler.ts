/**
 * MARKET — Update Scheduler
 * =========================
 *
 * Single writer of Market State. Every interval:
 *   read live -> drift -> delta -> recompute positions -> publish
 *
 * A tick is synchronous, so it either publishes a complete snapshot or
 * nothing. A failed tick is reported and the loop carries on at the next
 * boundary. stop() interrupts the pending wait.
 */

import { errorMessage } from '../../../common/errors.js';
import { systemClock } from '../../../common/logger.js';
import type { Clock, Logger } from '../../../common/logger.js';
import type { DriftFn } from '../../curve/services/curve.drift.js';
import { delay } from '../../shared/runtime/abortable-delay.js';
import type { MarketSnapshot } from '../contracts/market.types.js';
import type { MarketState } from './market.state.js';
import { buildSnapshot } from './snapshot.builder.js';
import { totalPnl } from '../../portfolio/services/pnl.engine.js';
import { curveDelta } from '../../curve/services/nelson-siegel.model.js';

export interface UpdateSchedulerConfig {
  intervalMs: number;
  drift: DriftFn;
  logger: Logger;
  clock?: Clock;
  /** Observability hook for abandoned ticks */
  onTickError?: (err: unknown, tick: number) => void;
}

export interface SchedulerStats {
  running: boolean;
  intervalMs: number;
  ticks: number;
  failures: number;
  skipped: number;
  lastTickAt?: string;
  lastError?: string;
}

export class UpdateScheduler {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly clock: Clock;
  private ticks = 0;
  private failures = 0;
  private skipped = 0;
  private lastTickAt?: string;
  private lastError?: string;

  constructor(
    private readonly state: MarketState,
    private readonly config: UpdateSchedulerConfig
  ) {
    this.clock = config.clock ?? systemClock;
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Run one simulation step and publish it.
   */
  tick(): MarketSnapshot {
    const current = this.state.snapshot();
    const live = this.config.drift(current.live);
    const next = buildSnapshot({
      tick: current.tick + 1,
      source: 'tick',
      live,
      sod: current.sod,
      positions: current.positions,
      timestamp: this.clock.now(),
    });
    this.state.publish(next);

    this.ticks++;
    this.lastTickAt = next.timestamp;

    if (this.config.logger.debug) {
      const delta = Object.values(curveDelta(next.live, next.sod));
      const maxDeltaBp = delta.reduce((m, d) => Math.max(m, Math.abs(d)), 0);
      this.config.logger.debug(
        { tick: next.tick, maxDeltaBp, totalPnl: totalPnl(next.positions) },
        'Curve updated'
      );
    }
    return next;
  }

  start(): boolean {
    if (this.controller) return false;

    this.state.seal();
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);

    this.config.logger.info({ intervalMs: this.config.intervalMs }, 'Update scheduler started');
    return true;
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;

    controller.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;

    this.config.logger.info({ ticks: this.ticks, failures: this.failures }, 'Update scheduler stopped');
  }

  getStats(): SchedulerStats {
    return {
      running: this.isRunning(),
      intervalMs: this.config.intervalMs,
      ticks: this.ticks,
      failures: this.failures,
      skipped: this.skipped,
      lastTickAt: this.lastTickAt,
      lastError: this.lastError,
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await delay(this.config.intervalMs, signal);
      if (signal.aborted) break;

      if (!this.state.isSeeded()) {
        this.skipped++;
        this.config.logger.warn({}, 'Market state not seeded, skipping update');
        continue;
      }

      try {
        this.tick();
      } catch (err) {
        this.failures++;
        this.lastError = errorMessage(err);
        this.config.logger.error({ err: this.lastError }, 'Tick failed, keeping last snapshot');
        this.report(err);
      }
    }
  }

  private report(err: unknown): void {
    if (!this.config.onTickError) return;
    try {
      this.config.onTickError(err, this.ticks + 1);
    } catch (hookErr) {
      this.config.logger.error({ err: errorMessage(hookErr) }, 'Tick error hook failed');
    }
  }
}
