/**
 * MARKET — Snapshot Distributor
 * =============================
 *
 * Pull: every read calls state.snapshot() once and projects from it.
 * Push: one loop per subscriber. Each loop delivers the latest snapshot
 * when its tick moved on, then waits on its own timer (interval mode) or
 * for the next publish (publish mode). A failing sink ends only its own
 * loop; the loop's finally block is the single place a subscriber leaves
 * the registry.
 */

import { v4 as uuidv4 } from 'uuid';
import { NotInitializedError, errorMessage } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { WakeSignal, delay, whenAborted } from '../../shared/runtime/abortable-delay.js';
import type {
  CurveView,
  MarketSnapshot,
  MarketSummary,
  PnlReport,
  PositionsView,
  StreamFrame,
} from '../contracts/market.types.js';
import type { MarketState } from './market.state.js';
import {
  projectCurve,
  projectPnl,
  projectPositions,
  projectStreamFrame,
  projectSummary,
} from './snapshot.builder.js';

export type StreamMode = 'interval' | 'publish';

export interface SnapshotSink<T> {
  send(frame: T): Promise<void> | void;
  close?(reason: string): void;
}

export interface SubscribeOptions {
  mode?: StreamMode;
  intervalMs?: number;
}

export interface Subscription {
  readonly id: string;
  /** Resolves once the subscriber loop has exited and the sink is closed */
  readonly closed: Promise<void>;
  unsubscribe(): void;
}

export interface SnapshotDistributorConfig {
  logger: Logger;
  intervalMs: number;
  mode?: StreamMode;
}

export interface DistributorStats {
  subscribers: number;
  delivered: number;
  failed: number;
}

interface Subscriber {
  id: string;
  controller: AbortController;
  wake: WakeSignal;
  loop: Promise<void>;
}

export class SnapshotDistributor {
  private readonly subscribers = new Map<string, Subscriber>();
  private readonly detachPublish: () => void;
  private delivered = 0;
  private failed = 0;

  constructor(
    private readonly state: MarketState,
    private readonly config: SnapshotDistributorConfig
  ) {
    this.detachPublish = state.onPublish(() => {
      for (const sub of this.subscribers.values()) sub.wake.notify();
    });
  }

  // ===== PULL =====

  getSnapshot(): MarketSnapshot {
    return this.state.snapshot();
  }

  getCurve(tenors?: readonly string[]): CurveView {
    return projectCurve(this.state.snapshot(), tenors);
  }

  getPositions(): PositionsView {
    return projectPositions(this.state.snapshot());
  }

  getPnl(): PnlReport {
    return projectPnl(this.state.snapshot());
  }

  getSummary(): MarketSummary {
    return projectSummary(this.state.snapshot());
  }

  getFrame(): StreamFrame {
    return projectStreamFrame(this.state.snapshot());
  }

  // ===== PUSH =====

  subscribe<T>(
    sink: SnapshotSink<T>,
    project: (snapshot: MarketSnapshot) => T,
    options: SubscribeOptions = {}
  ): Subscription {
    const id = uuidv4();
    const controller = new AbortController();
    const wake = new WakeSignal();
    const mode = options.mode ?? this.config.mode ?? 'interval';
    const intervalMs = options.intervalMs ?? this.config.intervalMs;

    const sub: Subscriber = { id, controller, wake, loop: Promise.resolve() };
    this.subscribers.set(id, sub);
    sub.loop = this.runSubscriber(sub, sink, project, mode, intervalMs);

    this.config.logger.info({ id, mode, subscribers: this.subscribers.size }, 'Stream subscriber added');

    return {
      id,
      closed: sub.loop,
      unsubscribe: () => controller.abort(),
    };
  }

  subscriberCount(): number {
    return this.subscribers.size;
  }

  getStats(): DistributorStats {
    return {
      subscribers: this.subscribers.size,
      delivered: this.delivered,
      failed: this.failed,
    };
  }

  /**
   * Stop every subscriber loop and wait for them to finish.
   */
  async closeAll(): Promise<void> {
    const subs = [...this.subscribers.values()];
    for (const sub of subs) sub.controller.abort();
    await Promise.allSettled(subs.map((s) => s.loop));
    this.detachPublish();
  }

  private async runSubscriber<T>(
    sub: Subscriber,
    sink: SnapshotSink<T>,
    project: (snapshot: MarketSnapshot) => T,
    mode: StreamMode,
    intervalMs: number
  ): Promise<void> {
    const { signal } = sub.controller;
    const aborted = whenAborted(signal);
    let lastTick = -1;
    let closeReason = 'unsubscribed';

    try {
      while (!signal.aborted) {
        const snapshot = this.latest();
        if (snapshot && snapshot.tick !== lastTick) {
          // a sink that never settles must not pin the loop past unsubscribe
          await Promise.race([sink.send(project(snapshot)), aborted]);
          if (signal.aborted) break;
          lastTick = snapshot.tick;
          this.delivered++;
        }
        if (signal.aborted) break;

        if (mode === 'publish') {
          await sub.wake.wait(signal);
        } else {
          await delay(intervalMs, signal);
        }
      }
    } catch (err) {
      this.failed++;
      closeReason = 'delivery failed';
      this.config.logger.warn({ id: sub.id, err: errorMessage(err) }, 'Stream delivery failed, dropping subscriber');
    } finally {
      this.subscribers.delete(sub.id);
      this.closeSink(sub.id, sink, closeReason);
      this.config.logger.info(
        { id: sub.id, subscribers: this.subscribers.size },
        'Stream subscriber removed'
      );
    }
  }

  private latest(): MarketSnapshot | null {
    try {
      return this.state.snapshot();
    } catch (err) {
      if (err instanceof NotInitializedError) return null;
      throw err;
    }
  }

  private closeSink<T>(id: string, sink: SnapshotSink<T>, reason: string): void {
    if (!sink.close) return;
    try {
      sink.close(reason);
    } catch (err) {
      this.config.logger.warn({ id, err: errorMessage(err) }, 'Stream sink close failed');
    }
  }
}
