/**
 * CURVE — Nelson-Siegel model
 * ============================
 *
 *   y(t) = b0 + b1 * f1(t) + b2 * (f1(t) - e^(-lambda t))
 *   f1(t) = (1 - e^(-lambda t)) / (lambda t)
 *
 * All functions are pure.
 */

import { UnknownTenorError } from '../../../common/errors.js';
import { TENORS, TENOR_YEARS, isTenor, mapTenors } from '../contracts/curve.types.js';
import type {
  CurveDelta,
  CurveParameters,
  CurveYields,
  Tenor,
} from '../contracts/curve.types.js';

/** Below this maturity f1 is taken at its limit of 1 */
export const SHORT_END_EPSILON = 1e-10;

export const BP_PER_UNIT = 10_000;

export interface FactorLoadings {
  level: number;
  slope: number;
  curvature: number;
}

export function factorLoadings(lambda: number, tenorYears: number): FactorLoadings {
  if (tenorYears < SHORT_END_EPSILON) {
    return { level: 1, slope: 1, curvature: 0 };
  }
  const decay = Math.exp(-lambda * tenorYears);
  const slope = (1 - decay) / (lambda * tenorYears);
  return { level: 1, slope, curvature: slope - decay };
}

export function yieldAt(params: CurveParameters, tenorYears: number): number {
  if (tenorYears < SHORT_END_EPSILON) {
    return params.beta0 + params.beta1;
  }
  const f = factorLoadings(params.lambda, tenorYears);
  return params.beta0 + params.beta1 * f.slope + params.beta2 * f.curvature;
}

export function resolveTenors(labels: readonly string[]): Tenor[] {
  return labels.map((label) => {
    if (!isTenor(label)) throw new UnknownTenorError(label);
    return label;
  });
}

export function buildCurve(
  params: CurveParameters,
  tenors: readonly string[] = TENORS
): Partial<CurveYields> {
  const curve: Partial<Record<Tenor, number>> = {};
  for (const tenor of resolveTenors(tenors)) {
    curve[tenor] = yieldAt(params, TENOR_YEARS[tenor]);
  }
  return curve;
}

/**
 * Live minus SOD yield for every tenor, in basis points.
 */
export function curveDelta(live: CurveParameters, sod: CurveParameters): CurveDelta {
  return mapTenors((tenor) => {
    const years = TENOR_YEARS[tenor];
    return (yieldAt(live, years) - yieldAt(sod, years)) * BP_PER_UNIT;
  });
}

export function isValidParameters(params: CurveParameters): boolean {
  return (
    [params.beta0, params.beta1, params.beta2, params.lambda].every(Number.isFinite) &&
    params.lambda > 0
  );
}
