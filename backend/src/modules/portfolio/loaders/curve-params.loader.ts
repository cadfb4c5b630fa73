/**
 * Initial curve parameters loader
 *
 * JSON file: { "beta0": 0.055, "beta1": -0.015, "beta2": 0.008, "lambda": 0.6 }
 * Returns null when the file is absent or invalid; the caller falls back to
 * configured defaults.
 */

import fs from 'fs';
import { z } from 'zod';
import { errorMessage } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import type { CurveParameters } from '../../curve/contracts/curve.types.js';

export const CurveParametersSchema = z.object({
  beta0: z.number().finite(),
  beta1: z.number().finite(),
  beta2: z.number().finite(),
  lambda: z.number().finite().positive(),
});

export function loadCurveParameters(filePath: string, logger: Logger): CurveParameters | null {
  if (!fs.existsSync(filePath)) {
    logger.warn({ filePath }, 'Curve parameters file not found');
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    logger.warn({ filePath, err: errorMessage(err) }, 'Curve parameters file is not valid JSON');
    return null;
  }

  const parsed = CurveParametersSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn(
      { filePath, issues: parsed.error.flatten().fieldErrors },
      'Invalid curve parameters'
    );
    return null;
  }

  logger.info({ filePath, ...parsed.data }, 'Loaded curve parameters');
  return parsed.data;
}
