/**
 * Environment configuration
 *
 * Validated once at boot. Every knob has a default so the service starts
 * with an empty environment.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Server
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGINS: z
    .string()
    .default(
      'http://localhost:3000,http://localhost:5173,http://localhost:5174,http://127.0.0.1:3000,http://127.0.0.1:5173'
    ),

  // Streaming
  WS_ENABLED: booleanFlag.default('true'),
  WS_MAX_BUFFERED_BYTES: z.coerce.number().int().positive().default(1_048_576),
  STREAM_MODE: z.enum(['interval', 'publish']).default('interval'),
  STREAM_INTERVAL_MS: z.coerce.number().int().positive().optional(),

  // Simulation
  TICK_INTERVAL_MS: z.coerce.number().int().positive().default(500),
  DRIFT_MODE: z.enum(['parameter', 'bucket']).default('parameter'),
  DRIFT_VOLATILITY: z.coerce.number().nonnegative().default(0.0002),
  SIMULATION_SEED: z.coerce.number().int().optional(),

  // Seed data
  POSITIONS_FILE: z.string().min(1).default('backend/data/positions.csv'),
  CURVE_PARAMS_FILE: z.string().min(1).default('backend/data/curve_params.json'),
  NS_BETA0: z.coerce.number().default(0.055),
  NS_BETA1: z.coerce.number().default(-0.015),
  NS_BETA2: z.coerce.number().default(0.008),
  NS_LAMBDA: z.coerce.number().positive().default(0.6),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    console.error('[Config] Invalid environment:', parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables (see logs).');
  }
  return parsed.data;
}

export function corsOrigins(env: Env): true | string[] {
  return env.CORS_ORIGINS === '*'
    ? true
    : env.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean);
}
