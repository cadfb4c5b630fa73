/**
 * MARKET — Snapshot builder and projections
 * ==========================================
 *
 * buildSnapshot computes curve delta and position valuations together and
 * freezes the result. Projections derive every response from one snapshot.
 */

import { TENORS, TENOR_YEARS } from '../../curve/contracts/curve.types.js';
import type { CurveParameters, CurvePoint } from '../../curve/contracts/curve.types.js';
import {
  BP_PER_UNIT,
  curveDelta,
  resolveTenors,
  yieldAt,
} from '../../curve/services/nelson-siegel.model.js';
import type { PositionInput } from '../../portfolio/contracts/position.types.js';
import {
  portfolioTotals,
  recomputePositions,
  totalPnl,
} from '../../portfolio/services/pnl.engine.js';
import type {
  CurveView,
  MarketSnapshot,
  MarketSummary,
  PnlReport,
  PositionsView,
  SnapshotSource,
  StreamFrame,
} from '../contracts/market.types.js';

export interface SnapshotInput {
  tick: number;
  source: SnapshotSource;
  live: CurveParameters;
  sod: CurveParameters;
  positions: readonly PositionInput[];
  timestamp: Date;
}

export function buildSnapshot(input: SnapshotInput): MarketSnapshot {
  const delta = curveDelta(input.live, input.sod);
  const positions = recomputePositions(input.positions, delta);

  return Object.freeze({
    tick: input.tick,
    source: input.source,
    live: Object.freeze({ ...input.live }),
    sod: Object.freeze({ ...input.sod }),
    positions: Object.freeze(
      positions.map((p) => Object.freeze({ ...p, dv01: Object.freeze({ ...p.dv01 }) }))
    ),
    timestamp: input.timestamp.toISOString(),
  });
}

// ─────────────────────────────────────────────────────────────
// Projections
// ─────────────────────────────────────────────────────────────

export function projectCurvePoints(
  snapshot: MarketSnapshot,
  tenors: readonly string[] = TENORS
): CurvePoint[] {
  return resolveTenors(tenors).map((tenor) => {
    const years = TENOR_YEARS[tenor];
    const sodYield = yieldAt(snapshot.sod, years);
    const liveYield = yieldAt(snapshot.live, years);
    return { tenor, sodYield, liveYield, deltaBp: (liveYield - sodYield) * BP_PER_UNIT };
  });
}

export function projectCurve(snapshot: MarketSnapshot, tenors?: readonly string[]): CurveView {
  return {
    tick: snapshot.tick,
    timestamp: snapshot.timestamp,
    points: projectCurvePoints(snapshot, tenors),
  };
}

export function projectPositions(snapshot: MarketSnapshot): PositionsView {
  return {
    tick: snapshot.tick,
    timestamp: snapshot.timestamp,
    positions: snapshot.positions,
  };
}

export function projectPnl(snapshot: MarketSnapshot): PnlReport {
  return {
    totalPnl: totalPnl(snapshot.positions),
    positions: snapshot.positions,
    timestamp: snapshot.timestamp,
  };
}

export function projectSummary(snapshot: MarketSnapshot): MarketSummary {
  return {
    curveParameters: snapshot.live,
    sodParameters: snapshot.sod,
    ...portfolioTotals(snapshot.positions),
    tick: snapshot.tick,
    timestamp: snapshot.timestamp,
  };
}

export function projectStreamFrame(snapshot: MarketSnapshot): StreamFrame {
  const totals = portfolioTotals(snapshot.positions);
  return {
    type: 'snapshot',
    tick: snapshot.tick,
    timestamp: snapshot.timestamp,
    curve: projectCurvePoints(snapshot),
    positions: snapshot.positions,
    pnlSummary: {
      positionCount: totals.positionCount,
      totalPvSod: totals.totalPvSod,
      totalPvLive: totals.totalPvLive,
      totalPnl: totals.totalPnl,
    },
  };
}
