/**
 * Application errors
 *
 * Every error the HTTP layer can map to a status code extends AppError.
 * The global handler in app.ts renders them as { ok: false, error, message }.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR'
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Read before the first seed. Distinct from an empty portfolio.
 */
export class NotInitializedError extends AppError {
  constructor(message = 'Market state not yet initialized') {
    super(message, 503, 'NOT_INITIALIZED');
  }
}

export class UnknownTenorError extends AppError {
  constructor(public readonly tenor: string) {
    super(`Unknown tenor: ${tenor}`, 400, 'UNKNOWN_TENOR');
  }
}

export type MarketStateErrorCode =
  | 'ALREADY_SEEDED'
  | 'SEALED'
  | 'STALE_SNAPSHOT'
  | 'SOD_MUTATED'
  | 'INVALID_CURVE_PARAMETERS';

export class MarketStateError extends AppError {
  constructor(code: MarketStateErrorCode, message: string) {
    super(message, 409, code);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
