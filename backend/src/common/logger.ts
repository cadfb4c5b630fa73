/**
 * Logger contract injected into core services.
 *
 * Structurally compatible with Fastify's pino logger (app.log), so the
 * server passes it straight through; tests pass vi.fn() mocks.
 */

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export interface Clock {
  now: () => Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

const noop = (): void => {};

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
