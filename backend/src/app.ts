import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import fastifyWebsocket from '@fastify/websocket';
import { corsOrigins } from './config/env.js';
import type { Env } from './config/env.js';
import { AppError } from './common/errors.js';
import type { Logger } from './common/logger.js';
import { createMarketRuntime, registerMarketModule } from './modules/market/index.js';
import type { MarketModuleDeps } from './modules/market/index.js';

export type MarketFactory = (logger: Logger) => MarketModuleDeps;

export interface BuiltApp {
  app: FastifyInstance;
  market: MarketModuleDeps;
}

/**
 * Build Fastify Application
 *
 * The market runtime is created with the app's logger so core services log
 * through pino like the routes do.
 */
export function buildApp(
  env: Env,
  createMarket: MarketFactory = (logger) => createMarketRuntime(env, { logger })
): BuiltApp {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: corsOrigins(env),
    credentials: true,
  });

  // WebSocket plugin - register at root level
  if (env.WS_ENABLED) {
    app.register(fastifyWebsocket, {
      options: { maxPayload: 1048576 },
    });
  }

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  const market = createMarket(app.log);
  app.register(async (fastify) => {
    await registerMarketModule(fastify, market, { websocket: env.WS_ENABLED });
  });

  return { app, market };
}
