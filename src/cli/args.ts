/**
 * legacy-finance-reports - CLI Option Resolution
 *
 * Turns parsed command-line options and the environment into a database
 * configuration, a log level and report arguments.
 */

import {
  createDatabaseConfig,
  databaseConfigFromEnv,
  parseConnectionUrl,
} from "../config/DatabaseConfig.js";
import type { DatabaseConfig } from "../config/DatabaseConfig.js";
import { ValidationError } from "../types/errors.js";
import { LOG_LEVELS, isLogLevel } from "../utils/logger.js";
import type { LogLevel } from "../utils/logger.js";

/**
 * Global options shared by every command
 */
export interface GlobalOptions {
  url?: string | undefined;
  host?: string | undefined;
  port?: number | undefined;
  user?: string | undefined;
  password?: string | undefined;
  database?: string | undefined;
  connectTimeout?: number | undefined;
  poolMax?: number | undefined;
  logLevel?: string | undefined;
}

/**
 * Options of the `report` command
 */
export interface ReportOptions {
  customer?: string | undefined;
  payment?: string | undefined;
  start?: string | undefined;
  end?: string | undefined;
  limit?: number | undefined;
}

function defined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).filter(([, value]) => value !== undefined),
  );
}

/**
 * Resolve the database configuration
 *
 * Precedence, lowest first: DATABASE_URL, DB_* variables, --url, individual flags.
 */
export function buildDatabaseConfig(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig {
  const fromEnv = databaseConfigFromEnv(env);
  const fromUrl = options.url ? parseConnectionUrl(options.url) : {};

  return createDatabaseConfig({
    ...fromEnv,
    ...defined({ ...fromUrl }),
    ...defined({
      host: options.host,
      port: options.port,
      user: options.user,
      password: options.password,
      database: options.database,
      connectTimeout: options.connectTimeout,
      connectionLimit: options.poolMax,
    }),
  });
}

/**
 * Log level from --log-level, then LOG_LEVEL
 *
 * @throws ValidationError for a name that is not an RFC 5424 level
 */
export function resolveLogLevel(
  option: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel | undefined {
  const value = option ?? env["LOG_LEVEL"];
  if (value === undefined || value === "") {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new ValidationError(
      `Invalid log level '${value}', expected one of: ${LOG_LEVELS.join(", ")}`,
    );
  }
  return normalized;
}

/**
 * Map `report` command flags to report argument names
 */
export function reportArgs(options: ReportOptions): Record<string, unknown> {
  return defined({
    customerId: options.customer,
    paymentId: options.payment,
    startDate: options.start,
    endDate: options.end,
    limit: options.limit,
  });
}
