/**
 * legacy-finance-reports - Database Types
 *
 * Connection, pool, reflection and row types shared across the repository.
 */

/**
 * Scalar values the MySQL driver hands back for a column
 */
export type SqlValue = string | number | bigint | boolean | Date | Buffer | null;

/**
 * One result row: column name to value, in projection order
 */
export type Row = Record<string, SqlValue>;

/**
 * Named parameters bound to `:name` placeholders
 */
export type QueryParams = Record<string, string | number | Date | null>;

/**
 * Customer, payment and enrolment keys in the legacy schema
 */
export type EntityId = string | number;

/**
 * Calendar date, either `YYYY-MM-DD` or a Date
 */
export type DateInput = string | Date;

/**
 * Connection pool configuration
 */
export interface PoolConfig {
  /** Maximum number of connections in pool (default: 10) */
  connectionLimit?: number | undefined;

  /** Idle timeout before closing connection in ms (default: 3600000) */
  idleTimeoutMillis?: number | undefined;

  /** Queue requests when every connection is busy (default: true) */
  waitForConnections?: boolean | undefined;
}

/**
 * Connection pool statistics
 */
export interface PoolStats {
  /** Total connections in pool */
  total: number;

  /** Active connections (in use) */
  active: number;

  /** Idle connections (available) */
  idle: number;

  /** Waiting requests in queue */
  waiting: number;

  /** Total queries executed */
  totalQueries: number;
}

/**
 * Database connection health status
 */
export interface HealthStatus {
  connected: boolean;
  latencyMs?: number | undefined;
  version?: string | undefined;
  poolStats?: PoolStats | undefined;
  details?: Record<string, unknown> | undefined;
  error?: string | undefined;
}

/**
 * Outcome of a version probe
 */
export type ConnectionTestResult =
  | { connected: true; version: string | null }
  | { connected: false; error: string };

/**
 * Column metadata from information_schema.COLUMNS
 */
export interface ColumnInfo {
  name: string;
  type: string;
  columnType: string;
  nullable: boolean;
  primaryKey: boolean;
  defaultValue: string | null;
  autoIncrement: boolean;
  comment?: string | undefined;
}

/**
 * Reflected table metadata
 */
export interface TableInfo {
  name: string;
  schema: string;
  columns: ColumnInfo[];
  primaryKey: string[];
}
