/**
 * Positions CSV loader
 *
 * Expected header:
 *   cusip,notional,pv_sod,dv01_3M,dv01_6M,...,dv01_30Y
 *
 * Any subset of dv01_<tenor> columns is accepted. A missing or unreadable
 * file yields an empty portfolio; bad rows are skipped.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { errorMessage } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { isTenor } from '../../curve/contracts/curve.types.js';
import type { Tenor } from '../../curve/contracts/curve.types.js';
import type { PositionInput } from '../contracts/position.types.js';

const REQUIRED_COLUMNS = ['cusip', 'notional', 'pv_sod'] as const;
const DV01_PREFIX = 'dv01_';

const numericCell = z.string().trim().min(1).pipe(z.coerce.number().finite());

const PositionRowSchema = z.object({
  cusip: z.string().trim().min(1),
  notional: numericCell,
  pv_sod: numericCell,
});

const CsvSchema = z.array(z.array(z.string()));

export function parsePositionsCsv(raw: string, logger: Logger): PositionInput[] {
  const rows = CsvSchema.parse(
    parse(raw, { bom: true, skip_empty_lines: true, trim: true, relax_column_count: true })
  );
  if (rows.length === 0) {
    logger.error({}, 'Positions CSV is empty');
    return [];
  }

  const [header, ...body] = rows;
  const missing = REQUIRED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    logger.error({ missing }, 'Positions CSV is missing required columns');
    return [];
  }

  const dv01Columns: { index: number; tenor: Tenor }[] = [];
  header.forEach((column, index) => {
    if (!column.startsWith(DV01_PREFIX)) return;
    const label = column.slice(DV01_PREFIX.length);
    if (isTenor(label)) {
      dv01Columns.push({ index, tenor: label });
    } else {
      logger.warn({ column }, 'Ignoring DV01 column for unknown tenor');
    }
  });
  if (dv01Columns.length === 0) {
    logger.warn({}, 'No DV01 columns found in positions CSV');
  }

  const positions: PositionInput[] = [];
  body.forEach((cells, i) => {
    const line = i + 2;
    const record = Object.fromEntries(REQUIRED_COLUMNS.map((c) => [c, cells[header.indexOf(c)] ?? '']));
    const parsed = PositionRowSchema.safeParse(record);
    if (!parsed.success) {
      logger.warn({ line, issues: parsed.error.flatten().fieldErrors }, 'Skipping invalid position row');
      return;
    }

    const dv01: Partial<Record<Tenor, number>> = {};
    for (const { index, tenor } of dv01Columns) {
      const cell = (cells[index] ?? '').trim();
      if (cell === '') continue;
      const value = Number(cell);
      if (!Number.isFinite(value)) {
        logger.warn({ line, tenor, cell }, 'Skipping position row with invalid DV01');
        return;
      }
      dv01[tenor] = value;
    }

    positions.push({
      cusip: parsed.data.cusip,
      notional: parsed.data.notional,
      pvSod: parsed.data.pv_sod,
      dv01,
    });
  });

  return positions;
}

export function loadPositions(filePath: string, logger: Logger): PositionInput[] {
  if (!fs.existsSync(filePath)) {
    logger.error({ filePath }, 'Positions file not found');
    return [];
  }

  try {
    const positions = parsePositionsCsv(fs.readFileSync(filePath, 'utf-8'), logger);
    const totalNotional = positions.reduce((s, p) => s + p.notional, 0);
    const totalPv = positions.reduce((s, p) => s + p.pvSod, 0);
    logger.info(
      { filePath, count: positions.length, totalNotional, totalPv },
      'Loaded positions'
    );
    return positions;
  } catch (err) {
    logger.error({ filePath, err: errorMessage(err) }, 'Failed to load positions');
    return [];
  }
}
