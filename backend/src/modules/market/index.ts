/**
 * MARKET MODULE — Index
 */

import type { FastifyInstance } from 'fastify';
import type { MarketModuleDeps } from './market.runtime.js';
import { registerMarketRoutes } from './routes/market.routes.js';
import { registerStreamRoutes } from './routes/stream.routes.js';

// Types
export * from './contracts/market.types.js';

// Services
export { MarketState } from './services/market.state.js';
export { UpdateScheduler } from './services/update.scheduler.js';
export type { SchedulerStats } from './services/update.scheduler.js';
export { SnapshotDistributor } from './services/snapshot.distributor.js';
export type { SnapshotSink, Subscription, StreamMode } from './services/snapshot.distributor.js';
export * from './services/snapshot.builder.js';

// Wiring
export * from './market.runtime.js';

export interface RegisterMarketOptions {
  websocket: boolean;
}

/**
 * Register HTTP routes and, when enabled, the WebSocket stream.
 * Stops the scheduler and closes subscribers when the server closes.
 */
export async function registerMarketModule(
  app: FastifyInstance,
  deps: MarketModuleDeps,
  options: RegisterMarketOptions
): Promise<void> {
  await registerMarketRoutes(app, deps);
  if (options.websocket) {
    await registerStreamRoutes(app, deps);
  }

  app.addHook('onClose', async () => {
    await deps.scheduler.stop();
    await deps.distributor.closeAll();
  });
}
