import { vi } from 'vitest';
import type { Clock } from '../../../common/logger.js';
import type { CurveParameters } from '../../curve/contracts/curve.types.js';
import type { PositionInput } from '../../portfolio/contracts/position.types.js';

export const PARAMS: CurveParameters = { beta0: 0.055, beta1: -0.015, beta2: 0.008, lambda: 0.6 };

export const POSITIONS: PositionInput[] = [
  { cusip: 'TESTBOND05', notional: 10_000_000, pvSod: 9_985_000, dv01: { '10Y': 500 } },
  { cusip: 'TESTBOND07', notional: -12_000_000, pvSod: -11_940_000, dv01: { '2Y': -2200 } },
];

export const FIXED_CLOCK: Clock = { now: () => new Date('2026-01-02T10:00:00.000Z') };

export function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Parallel shift of the live curve by `bp` basis points per call */
export function levelShift(bp: number) {
  return (params: CurveParameters): CurveParameters => ({ ...params, beta0: params.beta0 + bp / 10_000 });
}
