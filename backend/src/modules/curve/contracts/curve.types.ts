/**
 * CURVE — Types
 * =============
 */

export const TENORS = ['3M', '6M', '1Y', '2Y', '5Y', '10Y', '30Y'] as const;

export type Tenor = (typeof TENORS)[number];

export const TENOR_YEARS: Readonly<Record<Tenor, number>> = Object.freeze({
  '3M': 0.25,
  '6M': 0.5,
  '1Y': 1,
  '2Y': 2,
  '5Y': 5,
  '10Y': 10,
  '30Y': 30,
});

export function isTenor(value: string): value is Tenor {
  return (TENORS as readonly string[]).includes(value);
}

/**
 * Nelson-Siegel parameters: level, slope, curvature, decay.
 */
export interface CurveParameters {
  readonly beta0: number;
  readonly beta1: number;
  readonly beta2: number;
  readonly lambda: number;
}

export type ShapeAdjustment = Pick<CurveParameters, 'beta0' | 'beta1' | 'beta2'>;

/** Tenor -> yield change since SOD, in basis points */
export type CurveDelta = Readonly<Record<Tenor, number>>;

export type CurveYields = Readonly<Record<Tenor, number>>;

export interface CurvePoint {
  tenor: Tenor;
  sodYield: number;
  liveYield: number;
  deltaBp: number;
}

export type DriftMode = 'parameter' | 'bucket';

/** Uniform [0, 1) source, Math.random-compatible */
export type RandomSource = () => number;

export function mapTenors<T>(fn: (tenor: Tenor) => T): Record<Tenor, T> {
  return {
    '3M': fn('3M'),
    '6M': fn('6M'),
    '1Y': fn('1Y'),
    '2Y': fn('2Y'),
    '5Y': fn('5Y'),
    '10Y': fn('10Y'),
    '30Y': fn('30Y'),
  };
}
