/**
 * CURVE — Drift generator
 * =======================
 *
 * Random evolution of the Nelson-Siegel shape parameters. lambda is a
 * structural constant for the run and is never perturbed.
 *
 * Two modes:
 * - parameter: independent N(0, vol) shocks on beta0, beta1, beta2
 * - bucket:    N(0, vol) yield shocks on a random subset of tenors, mapped
 *              back onto the shape parameters by least squares so the model
 *              stays the only source of yields
 */

import { TENORS, TENOR_YEARS } from '../contracts/curve.types.js';
import type {
  CurveParameters,
  DriftMode,
  RandomSource,
  ShapeAdjustment,
  Tenor,
} from '../contracts/curve.types.js';
import { factorLoadings } from './nelson-siegel.model.js';

/**
 * Standard normal draw (Box-Muller).
 */
export function gaussian(random: RandomSource = Math.random): number {
  // 1 - u keeps the log argument in (0, 1]
  const u1 = 1 - random();
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

export function driftParameters(
  params: CurveParameters,
  volatility: number,
  random: RandomSource = Math.random
): CurveParameters {
  return {
    beta0: params.beta0 + gaussian(random) * volatility,
    beta1: params.beta1 + gaussian(random) * volatility,
    beta2: params.beta2 + gaussian(random) * volatility,
    lambda: params.lambda,
  };
}

/**
 * Random non-empty subset of tenors, each kept with probability 1/2.
 */
export function pickBuckets(
  random: RandomSource = Math.random,
  tenors: readonly Tenor[] = TENORS
): Tenor[] {
  const picked = tenors.filter(() => random() < 0.5);
  if (picked.length > 0) return picked;
  const i = Math.min(tenors.length - 1, Math.floor(random() * tenors.length));
  return [tenors[i]];
}

/**
 * Shape-parameter change whose yields best match the given per-tenor
 * shocks (least squares over `tenors`, missing shocks count as zero).
 */
export function fitShapeAdjustment(
  shocks: Partial<Record<Tenor, number>>,
  lambda: number,
  tenors: readonly Tenor[] = TENORS
): ShapeAdjustment {
  const ata = [
    [0, 0, 0],
    [0, 0, 0],
    [0, 0, 0],
  ];
  const atb = [0, 0, 0];

  for (const tenor of tenors) {
    const f = factorLoadings(lambda, TENOR_YEARS[tenor]);
    const row = [f.level, f.slope, f.curvature];
    const shock = shocks[tenor] ?? 0;
    for (let i = 0; i < 3; i++) {
      atb[i] += row[i] * shock;
      for (let j = 0; j < 3; j++) {
        ata[i][j] += row[i] * row[j];
      }
    }
  }

  const [beta0, beta1, beta2] = solve3(ata, atb);
  return { beta0, beta1, beta2 };
}

export function bucketDrift(
  params: CurveParameters,
  volatility: number,
  random: RandomSource = Math.random
): CurveParameters {
  const shocks: Partial<Record<Tenor, number>> = {};
  for (const tenor of pickBuckets(random)) {
    shocks[tenor] = gaussian(random) * volatility;
  }

  const adj = fitShapeAdjustment(shocks, params.lambda);
  return {
    beta0: params.beta0 + adj.beta0,
    beta1: params.beta1 + adj.beta1,
    beta2: params.beta2 + adj.beta2,
    lambda: params.lambda,
  };
}

export type DriftFn = (params: CurveParameters) => CurveParameters;

export function createDrift(
  mode: DriftMode,
  volatility: number,
  random: RandomSource = Math.random
): DriftFn {
  switch (mode) {
    case 'parameter':
      return (params) => driftParameters(params, volatility, random);
    case 'bucket':
      return (params) => bucketDrift(params, volatility, random);
  }
}

// ─────────────────────────────────────────────────────────────
// 3x3 linear solve (Cramer's rule)
// ─────────────────────────────────────────────────────────────

function det3(m: number[][]): number {
  return (
    m[0][0] * (m[1][1] * m[2][2] - m[1][2] * m[2][1]) -
    m[0][1] * (m[1][0] * m[2][2] - m[1][2] * m[2][0]) +
    m[0][2] * (m[1][0] * m[2][1] - m[1][1] * m[2][0])
  );
}

function solve3(a: number[][], b: number[]): [number, number, number] {
  const d = det3(a);
  if (!Number.isFinite(d) || Math.abs(d) < 1e-14) {
    throw new Error('Singular factor loadings matrix');
  }
  const column = (k: number): number[][] =>
    a.map((row, i) => row.map((v, j) => (j === k ? b[i] : v)));
  return [det3(column(0)) / d, det3(column(1)) / d, det3(column(2)) / d];
}
