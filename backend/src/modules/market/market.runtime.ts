/**
 * MARKET — Runtime wiring
 * =======================
 *
 * Builds the one Market State instance and hands it by reference to the
 * scheduler and the distributor.
 */

import path from 'path';
import type { Env } from '../../config/env.js';
import type { Clock, Logger } from '../../common/logger.js';
import { createDrift, createSeededRandom } from '../curve/index.js';
import type { CurveParameters, RandomSource } from '../curve/index.js';
import { loadCurveParameters, loadPositions } from '../portfolio/index.js';
import type { PositionInput } from '../portfolio/index.js';
import { MarketState } from './services/market.state.js';
import { SnapshotDistributor } from './services/snapshot.distributor.js';
import type { StreamMode } from './services/snapshot.distributor.js';
import { UpdateScheduler } from './services/update.scheduler.js';

export interface StreamOptions {
  mode: StreamMode;
  intervalMs: number;
  maxBufferedBytes: number;
}

export interface MarketModuleDeps {
  state: MarketState;
  scheduler: UpdateScheduler;
  distributor: SnapshotDistributor;
  streamOptions: StreamOptions;
}

export interface SeedData {
  params: CurveParameters;
  positions: PositionInput[];
}

export interface MarketRuntimeOptions {
  logger: Logger;
  clock?: Clock;
  random?: RandomSource;
  onTickError?: (err: unknown, tick: number) => void;
}

export function defaultCurveParameters(env: Env): CurveParameters {
  return {
    beta0: env.NS_BETA0,
    beta1: env.NS_BETA1,
    beta2: env.NS_BETA2,
    lambda: env.NS_LAMBDA,
  };
}

/**
 * Read positions and initial parameters from disk. Never throws: missing
 * data degrades to an empty portfolio and the configured parameters.
 */
export function loadSeedData(env: Env, logger: Logger): SeedData {
  const positions = loadPositions(path.resolve(process.cwd(), env.POSITIONS_FILE), logger);
  if (positions.length === 0) {
    logger.warn({}, 'No positions loaded, starting with an empty portfolio');
  }

  const fromFile = loadCurveParameters(path.resolve(process.cwd(), env.CURVE_PARAMS_FILE), logger);
  const params = fromFile ?? defaultCurveParameters(env);
  if (!fromFile) {
    logger.warn({ ...params }, 'Using configured curve parameters');
  }

  return { params, positions };
}

export function createMarketRuntime(env: Env, options: MarketRuntimeOptions): MarketModuleDeps {
  const { logger, clock } = options;
  const random =
    options.random ??
    (env.SIMULATION_SEED !== undefined ? createSeededRandom(env.SIMULATION_SEED) : Math.random);

  const state = new MarketState({ logger, clock });
  const scheduler = new UpdateScheduler(state, {
    intervalMs: env.TICK_INTERVAL_MS,
    drift: createDrift(env.DRIFT_MODE, env.DRIFT_VOLATILITY, random),
    logger,
    clock,
    onTickError: options.onTickError,
  });

  const streamOptions: StreamOptions = {
    mode: env.STREAM_MODE,
    intervalMs: env.STREAM_INTERVAL_MS ?? env.TICK_INTERVAL_MS,
    maxBufferedBytes: env.WS_MAX_BUFFERED_BYTES,
  };
  const distributor = new SnapshotDistributor(state, {
    logger,
    intervalMs: streamOptions.intervalMs,
    mode: streamOptions.mode,
  });

  return { state, scheduler, distributor, streamOptions };
}
