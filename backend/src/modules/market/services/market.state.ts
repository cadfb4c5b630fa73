/**
 * MARKET — Market State
 * =====================
 *
 * Holds exactly one immutable MarketSnapshot. publish() swaps the reference
 * in a single assignment, so readers see either the previous or the next
 * snapshot, never a mix.
 *
 *   UNINITIALIZED --seed()--> SEEDED --publish()/reset()--> SEEDED
 */

import { MarketStateError, NotInitializedError, errorMessage } from '../../../common/errors.js';
import { systemClock } from '../../../common/logger.js';
import type { Clock, Logger } from '../../../common/logger.js';
import type { CurveParameters } from '../../curve/contracts/curve.types.js';
import { isValidParameters } from '../../curve/services/nelson-siegel.model.js';
import type { PositionInput } from '../../portfolio/contracts/position.types.js';
import type {
  MarketSnapshot,
  MarketStatus,
  PublishListener,
} from '../contracts/market.types.js';
import { buildSnapshot } from './snapshot.builder.js';

export interface MarketStateOptions {
  logger: Logger;
  clock?: Clock;
}

function sameParameters(a: CurveParameters, b: CurveParameters): boolean {
  return (
    Object.is(a.beta0, b.beta0) &&
    Object.is(a.beta1, b.beta1) &&
    Object.is(a.beta2, b.beta2) &&
    Object.is(a.lambda, b.lambda)
  );
}

export class MarketState {
  private current: MarketSnapshot | null = null;
  private sealed = false;
  private readonly listeners = new Set<PublishListener>();
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: MarketStateOptions) {
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
  }

  get status(): MarketStatus {
    return this.current ? 'SEEDED' : 'UNINITIALIZED';
  }

  isSeeded(): boolean {
    return this.current !== null;
  }

  /**
   * One-time initialization: sod = live = params, PnL = 0.
   */
  seed(params: CurveParameters, positions: readonly PositionInput[]): MarketSnapshot {
    if (this.current) {
      throw new MarketStateError('ALREADY_SEEDED', 'Market state is already seeded');
    }
    if (this.sealed) {
      throw new MarketStateError('SEALED', 'Market state cannot be seeded after the scheduler started');
    }
    if (!isValidParameters(params)) {
      throw new MarketStateError(
        'INVALID_CURVE_PARAMETERS',
        'Curve parameters must be finite with lambda > 0'
      );
    }

    const snapshot = buildSnapshot({
      tick: 0,
      source: 'seed',
      live: params,
      sod: params,
      positions,
      timestamp: this.clock.now(),
    });
    this.swap(snapshot);

    this.logger.info(
      { positions: snapshot.positions.length, ...snapshot.sod },
      'Market state seeded'
    );
    return snapshot;
  }

  /**
   * Disallow seeding from here on.
   */
  seal(): void {
    this.sealed = true;
  }

  snapshot(): MarketSnapshot {
    if (!this.current) throw new NotInitializedError();
    return this.current;
  }

  publish(next: MarketSnapshot): void {
    const current = this.snapshot();
    if (next.tick <= current.tick) {
      throw new MarketStateError(
        'STALE_SNAPSHOT',
        `Snapshot tick ${next.tick} is not newer than current tick ${current.tick}`
      );
    }
    if (!sameParameters(next.sod, current.sod)) {
      throw new MarketStateError('SOD_MUTATED', 'Start-of-day parameters are write-once');
    }
    this.swap(next);
  }

  /**
   * live := sod, zero PnL everywhere.
   */
  reset(): MarketSnapshot {
    const current = this.snapshot();
    const next = buildSnapshot({
      tick: current.tick + 1,
      source: 'reset',
      live: { ...current.sod },
      sod: current.sod,
      positions: current.positions,
      timestamp: this.clock.now(),
    });
    this.publish(next);

    this.logger.info({ tick: next.tick }, 'Curve reset to SOD');
    return next;
  }

  onPublish(listener: PublishListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private swap(next: MarketSnapshot): void {
    this.current = next;
    for (const listener of [...this.listeners]) {
      try {
        listener(next);
      } catch (err) {
        this.logger.error({ tick: next.tick, err: errorMessage(err) }, 'Publish listener failed');
      }
    }
  }
}
