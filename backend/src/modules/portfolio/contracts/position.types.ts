/**
 * PORTFOLIO — Types
 * =================
 */

import type { Tenor } from '../../curve/contracts/curve.types.js';

/** Tenor -> dollar change per 1bp. Missing tenors carry no sensitivity. */
export type Dv01Buckets = Readonly<Partial<Record<Tenor, number>>>;

/**
 * Position as loaded at startup. Never added or removed during a run.
 */
export interface PositionInput {
  readonly cusip: string;
  readonly notional: number;
  readonly pvSod: number;
  readonly dv01: Dv01Buckets;
}

/**
 * Position with the derived fields recomputed every tick.
 */
export interface Position extends PositionInput {
  readonly pvLive: number;
  readonly pnl: number;
}

export interface PortfolioTotals {
  positionCount: number;
  totalNotional: number;
  totalPvSod: number;
  totalPvLive: number;
  totalPnl: number;
}
