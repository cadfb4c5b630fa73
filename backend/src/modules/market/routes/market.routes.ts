/**
 * MARKET — HTTP routes
 * ====================
 *
 * Every handler takes exactly one snapshot through the distributor, so a
 * response never mixes two ticks.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../../common/errors.js';
import type { MarketModuleDeps } from '../market.runtime.js';

const CurveQuerySchema = z.object({
  tenors: z.string().optional(),
});

function parseTenorList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const tenors = raw
    .split(',')
    .map((t) => t.trim().toUpperCase())
    .filter(Boolean);
  return tenors.length > 0 ? tenors : undefined;
}

export async function registerMarketRoutes(
  app: FastifyInstance,
  deps: MarketModuleDeps
): Promise<void> {
  const { state, distributor, scheduler } = deps;

  // ─────────────────────────────────────────────────────────────
  // GET /api/v1/curve — SOD vs live yields per tenor
  // ─────────────────────────────────────────────────────────────
  app.get('/api/v1/curve', async (req) => {
    const query = CurveQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw new ValidationError('Query parameter "tenors" must be a comma-separated list');
    }
    return { ok: true, ...distributor.getCurve(parseTenorList(query.data.tenors)) };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/v1/positions — positions with live PV and PnL
  // ─────────────────────────────────────────────────────────────
  app.get('/api/v1/positions', async () => {
    return { ok: true, ...distributor.getPositions() };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/v1/pnl — portfolio PnL report
  // ─────────────────────────────────────────────────────────────
  app.get('/api/v1/pnl', async () => {
    return { ok: true, ...distributor.getPnl() };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/v1/summary — parameters and portfolio totals
  // ─────────────────────────────────────────────────────────────
  app.get('/api/v1/summary', async () => {
    return { ok: true, ...distributor.getSummary() };
  });

  // ─────────────────────────────────────────────────────────────
  // POST /api/v1/reset — live curve back to SOD
  // ─────────────────────────────────────────────────────────────
  app.post('/api/v1/reset', async () => {
    const snapshot = state.reset();
    return {
      ok: true,
      message: 'Curve reset to start-of-day',
      tick: snapshot.tick,
      timestamp: snapshot.timestamp,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/v1/health
  // ─────────────────────────────────────────────────────────────
  app.get('/api/v1/health', async () => {
    const seeded = state.isSeeded();
    return {
      ok: true,
      status: seeded ? 'ok' : 'initializing',
      market: {
        status: state.status,
        tick: seeded ? state.snapshot().tick : null,
      },
      scheduler: scheduler.getStats(),
      stream: distributor.getStats(),
      timestamp: new Date().toISOString(),
    };
  });

  app.log.info('Market routes registered');
}
