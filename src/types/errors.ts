/**
 * legacy-finance-reports - Error Types
 *
 * Custom error classes for repository operations.
 */

/**
 * Base error class for legacy-finance-reports
 */
export class LegacyRepositoryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LegacyRepositoryError";
  }
}

/**
 * Database connection error
 */
export class ConnectionError extends LegacyRepositoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONNECTION_ERROR", details);
    this.name = "ConnectionError";
  }
}

/**
 * Connection pool error
 */
export class PoolError extends LegacyRepositoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "POOL_ERROR", details);
    this.name = "PoolError";
  }
}

/**
 * Query execution error
 */
export class QueryError extends LegacyRepositoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "QUERY_ERROR", details);
    this.name = "QueryError";
  }
}

/**
 * Session commit/rollback error
 */
export class TransactionError extends LegacyRepositoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "TRANSACTION_ERROR", details);
    this.name = "TransactionError";
  }
}

/**
 * Validation error for configuration and input parameters
 */
export class ValidationError extends LegacyRepositoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * Reflection found no columns for the requested table
 */
export class TableNotFoundError extends LegacyRepositoryError {
  constructor(tableName: string, details?: Record<string, unknown>) {
    super(`Table '${tableName}' does not exist in the current database`, "TABLE_NOT_FOUND", {
      table: tableName,
      ...details,
    });
    this.name = "TableNotFoundError";
  }
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
