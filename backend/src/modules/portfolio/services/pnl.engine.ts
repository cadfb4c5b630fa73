/**
 * PORTFOLIO — PnL engine
 * ======================
 *
 *   pnl    = round2( sum_t dv01[t] * delta[t] )
 *   pvLive = round2( pvSod + pnl )
 *
 * Rounding is per position; aggregates sum the rounded values.
 */

import { TENORS } from '../../curve/contracts/curve.types.js';
import type { CurveDelta } from '../../curve/contracts/curve.types.js';
import type {
  Dv01Buckets,
  PortfolioTotals,
  Position,
  PositionInput,
} from '../contracts/position.types.js';

export function roundCents(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  // normalise -0
  return rounded === 0 ? 0 : rounded;
}

export function positionPnl(dv01: Dv01Buckets, delta: Partial<CurveDelta>): number {
  let pnl = 0;
  for (const tenor of TENORS) {
    const sensitivity = dv01[tenor];
    if (sensitivity !== undefined) pnl += sensitivity * (delta[tenor] ?? 0);
  }
  return pnl;
}

export function recomputePositions(
  positions: readonly PositionInput[],
  delta: Partial<CurveDelta>
): Position[] {
  return positions.map((p) => {
    const pnl = roundCents(positionPnl(p.dv01, delta));
    return {
      cusip: p.cusip,
      notional: p.notional,
      pvSod: p.pvSod,
      dv01: { ...p.dv01 },
      pvLive: roundCents(p.pvSod + pnl),
      pnl,
    };
  });
}

export function totalPnl(positions: readonly Position[]): number {
  return roundCents(positions.reduce((sum, p) => sum + p.pnl, 0));
}

export function portfolioTotals(positions: readonly Position[]): PortfolioTotals {
  let totalNotional = 0;
  let totalPvSod = 0;
  let totalPvLive = 0;
  for (const p of positions) {
    totalNotional += p.notional;
    totalPvSod += p.pvSod;
    totalPvLive += p.pvLive;
  }
  return {
    positionCount: positions.length,
    totalNotional: roundCents(totalNotional),
    totalPvSod: roundCents(totalPvSod),
    totalPvLive: roundCents(totalPvLive),
    totalPnl: totalPnl(positions),
  };
}
