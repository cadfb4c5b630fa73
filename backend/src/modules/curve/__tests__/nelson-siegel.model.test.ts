/**
 * Nelson-Siegel model tests
 *
 * 1. Short-end limit
 * 2. Reference yields
 * 3. Tenor resolution
 * 4. Curve delta in basis points
 */

import { describe, it, expect } from 'vitest';
import {
  buildCurve,
  curveDelta,
  factorLoadings,
  isValidParameters,
  resolveTenors,
  yieldAt,
} from '../services/nelson-siegel.model.js';
import { TENORS, TENOR_YEARS } from '../contracts/curve.types.js';
import type { CurveParameters } from '../contracts/curve.types.js';
import { UnknownTenorError } from '../../../common/errors.js';

const PARAMS: CurveParameters = { beta0: 0.055, beta1: -0.015, beta2: 0.008, lambda: 0.6 };

describe('Nelson-Siegel model', () => {
  describe('yieldAt', () => {
    it('should return beta0 + beta1 at zero maturity', () => {
      expect(yieldAt(PARAMS, 0)).toBe(PARAMS.beta0 + PARAMS.beta1);
    });

    it('should approach beta0 + beta1 for very short maturities', () => {
      expect(yieldAt(PARAMS, 1e-6)).toBeCloseTo(0.04, 7);
    });

    it('should price the 10Y point of the reference curve', () => {
      expect(yieldAt(PARAMS, TENOR_YEARS['10Y'])).toBeCloseTo(0.0538164, 6);
    });

    it('should converge to beta0 at the long end', () => {
      expect(yieldAt(PARAMS, 1000)).toBeCloseTo(PARAMS.beta0, 4);
    });
  });

  describe('factorLoadings', () => {
    it('should use the limit loadings below the short-end threshold', () => {
      expect(factorLoadings(0.6, 0)).toEqual({ level: 1, slope: 1, curvature: 0 });
    });

    it('should keep curvature equal to slope minus decay', () => {
      const f = factorLoadings(0.6, 5);
      expect(f.curvature).toBeCloseTo(f.slope - Math.exp(-3), 12);
    });
  });

  describe('resolveTenors / buildCurve', () => {
    it('should reject an unknown tenor label', () => {
      expect(() => resolveTenors(['1Y', '7Y'])).toThrow(UnknownTenorError);
      expect(() => buildCurve(PARAMS, ['7Y'])).toThrow('Unknown tenor: 7Y');
    });

    it('should build every tenor by default', () => {
      expect(Object.keys(buildCurve(PARAMS))).toEqual([...TENORS]);
    });

    it('should build only the requested tenors', () => {
      const curve = buildCurve(PARAMS, ['10Y', '3M']);
      expect(Object.keys(curve).sort()).toEqual(['10Y', '3M']);
      expect(curve['10Y']).toBe(yieldAt(PARAMS, 10));
    });
  });

  describe('curveDelta', () => {
    it('should be exactly zero when live equals sod', () => {
      const delta = curveDelta(PARAMS, PARAMS);
      for (const tenor of TENORS) {
        expect(delta[tenor]).toBe(0);
      }
    });

    it('should report a parallel level shift as the same bp move everywhere', () => {
      const live = { ...PARAMS, beta0: PARAMS.beta0 + 0.0005 };
      const delta = curveDelta(live, PARAMS);
      for (const tenor of TENORS) {
        expect(delta[tenor]).toBeCloseTo(5, 8);
      }
    });
  });

  describe('isValidParameters', () => {
    it('should require finite values and positive lambda', () => {
      expect(isValidParameters(PARAMS)).toBe(true);
      expect(isValidParameters({ ...PARAMS, lambda: 0 })).toBe(false);
      expect(isValidParameters({ ...PARAMS, beta1: Number.NaN })).toBe(false);
      expect(isValidParameters({ ...PARAMS, beta0: Infinity })).toBe(false);
    });
  });
});
