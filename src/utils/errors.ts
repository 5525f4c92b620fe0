import Database from 'better-sqlite3';

export const ERROR_CODES = {
  STORE_FAILURE: 'STORE_FAILURE',
  CONFIGURATION: 'CONFIGURATION',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class TaggingError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TaggingError';
  }
}

/** The store rejected a statement; the surrounding transaction has been rolled back. */
export class StoreError extends TaggingError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.STORE_FAILURE, context, options);
    this.name = 'StoreError';
  }
}

/** A configured strategy threw, or a configuration value is unusable. */
export class ConfigurationError extends TaggingError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.CONFIGURATION, context, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Runs a store operation, converting SQLite failures into StoreError.
 * Anything else (including ConfigurationError) passes through untouched.
 */
export function withStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      throw new StoreError(
        `Store failure during ${operation}: ${error.message}`,
        { operation, sqliteCode: error.code },
        { cause: error }
      );
    }
    throw error;
  }
}
