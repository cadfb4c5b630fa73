/**
 * Server entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { loadEnv } from './config/env.js';
import { loadSeedData } from './modules/market/index.js';

async function main(): Promise<void> {
  const env = loadEnv();

  console.log('[BOOT] Starting yield curve simulator...');
  const { app, market } = buildApp(env);

  const seed = loadSeedData(env, app.log);
  market.state.seed(seed.params, seed.positions);
  market.scheduler.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[BOOT] ${signal} received, shutting down...`);
    try {
      await app.close();
      console.log('[BOOT] Shutdown complete');
      process.exit(0);
    } catch (err) {
      console.error('[BOOT] Shutdown failed:', err);
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ host: env.HOST, port: env.PORT });
  console.log(`[BOOT] ✅ Listening on http://${env.HOST}:${env.PORT} (tick ${env.TICK_INTERVAL_MS}ms)`);
}

main().catch((err) => {
  console.error('[BOOT] Fatal startup error:', err);
  process.exit(1);
});
