/**
 * MARKET — Types
 * ==============
 */

import type { CurveParameters, CurvePoint } from '../../curve/contracts/curve.types.js';
import type { PortfolioTotals, Position } from '../../portfolio/contracts/position.types.js';

export type SnapshotSource = 'seed' | 'tick' | 'reset';

export type MarketStatus = 'UNINITIALIZED' | 'SEEDED';

/**
 * One consistent view of curve + positions. Deep-frozen once built;
 * each tick replaces it as a whole.
 */
export interface MarketSnapshot {
  /** 0 at seed, strictly increasing afterwards */
  readonly tick: number;
  readonly source: SnapshotSource;
  readonly live: CurveParameters;
  readonly sod: CurveParameters;
  readonly positions: readonly Position[];
  readonly timestamp: string;
}

export interface CurveView {
  tick: number;
  timestamp: string;
  points: CurvePoint[];
}

export interface PositionsView {
  tick: number;
  timestamp: string;
  positions: readonly Position[];
}

export interface PnlReport {
  totalPnl: number;
  positions: readonly Position[];
  timestamp: string;
}

export interface MarketSummary extends PortfolioTotals {
  curveParameters: CurveParameters;
  sodParameters: CurveParameters;
  tick: number;
  timestamp: string;
}

export type PnlSummary = Omit<PortfolioTotals, 'totalNotional'>;

/**
 * Push frame sent to streaming subscribers.
 */
export interface StreamFrame {
  type: 'snapshot';
  tick: number;
  timestamp: string;
  curve: CurvePoint[];
  positions: readonly Position[];
  pnlSummary: PnlSummary;
}

export type PublishListener = (snapshot: MarketSnapshot) => void;
