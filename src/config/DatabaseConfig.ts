/**
 * legacy-finance-reports - Database Configuration
 *
 * Immutable connection settings for the legacy MySQL database, validated with zod.
 */

import { z } from "zod";
import { ValidationError } from "../types/errors.js";

export const DEFAULT_DATABASE_CONFIG = Object.freeze({
  host: "localhost",
  port: 33060,
  user: "root",
  password: "root",
  database: "smw_legacy_full",
  connectTimeout: 10,
  connectionLimit: 10,
});

export const DatabaseConfigSchema = z
  .object({
    host: z.string().min(1).default(DEFAULT_DATABASE_CONFIG.host),
    port: z.coerce
      .number()
      .int()
      .min(1)
      .max(65535)
      .default(DEFAULT_DATABASE_CONFIG.port),
    user: z.string().min(1).default(DEFAULT_DATABASE_CONFIG.user),
    password: z.string().default(DEFAULT_DATABASE_CONFIG.password),
    database: z.string().min(1).default(DEFAULT_DATABASE_CONFIG.database),
    /** Seconds to wait for the initial handshake */
    connectTimeout: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_DATABASE_CONFIG.connectTimeout),
    connectionLimit: z.coerce
      .number()
      .int()
      .positive()
      .max(100)
      .default(DEFAULT_DATABASE_CONFIG.connectionLimit),
  })
  .strict();

export type DatabaseConfig = Readonly<z.output<typeof DatabaseConfigSchema>>;

export type DatabaseConfigInput = {
  -readonly [K in keyof DatabaseConfig]?: DatabaseConfig[K] | undefined;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Drop undefined and empty-string values so schema defaults apply
 */
function compact(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined && value !== "") {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Validate a partial configuration, fill defaults and freeze the result
 *
 * @throws ValidationError when a field is out of range or unknown
 */
export function createDatabaseConfig(
  input: DatabaseConfigInput | Record<string, unknown> = {},
): DatabaseConfig {
  const parsed = DatabaseConfigSchema.safeParse(compact({ ...input }));
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid database configuration: ${formatIssues(parsed.error)}`,
      { issues: parsed.error.issues },
    );
  }
  return Object.freeze(parsed.data);
}

/**
 * Decode a mysql:// URL into configuration fields
 *
 * @example
 * parseConnectionUrl("mysql://report:pw@db.internal:3306/legacy?connectTimeout=5")
 */
export function parseConnectionUrl(url: string): DatabaseConfigInput {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError("Connection URL is not a valid URL");
  }

  if (parsed.protocol !== "mysql:") {
    throw new ValidationError(
      `Unsupported connection URL scheme '${parsed.protocol.replace(/:$/, "")}', expected 'mysql'`,
    );
  }

  const input: DatabaseConfigInput = {};
  if (parsed.hostname) input.host = parsed.hostname;
  if (parsed.port) input.port = Number(parsed.port);
  if (parsed.username) input.user = decodeURIComponent(parsed.username);
  if (parsed.password) input.password = decodeURIComponent(parsed.password);

  const database = decodeURIComponent(parsed.pathname.replace(/^\//, ""));
  if (database) input.database = database;

  const timeout =
    parsed.searchParams.get("connectTimeout") ??
    parsed.searchParams.get("connect_timeout");
  if (timeout !== null) input.connectTimeout = Number(timeout);

  return input;
}

/**
 * Build configuration from environment variables
 *
 * DB_* variables take precedence over the parts of DATABASE_URL.
 */
export function databaseConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig {
  const fromUrl = env["DATABASE_URL"]
    ? parseConnectionUrl(env["DATABASE_URL"])
    : {};

  return createDatabaseConfig({
    ...compact({ ...fromUrl }),
    ...compact({
      host: env["DB_HOST"],
      port: env["DB_PORT"],
      user: env["DB_USER"],
      password: env["DB_PASSWORD"],
      database: env["DB_NAME"],
      connectTimeout: env["DB_CONNECT_TIMEOUT"],
      connectionLimit: env["DB_POOL_MAX"],
    }),
  });
}

/**
 * Render the configuration as a mysql:// URI
 */
export function toConnectionUri(
  config: DatabaseConfig,
  options: { redactPassword?: boolean } = {},
): string {
  const redact = options.redactPassword ?? true;
  const password = redact ? "****" : encodeURIComponent(config.password);
  return (
    `mysql://${encodeURIComponent(config.user)}:${password}` +
    `@${config.host}:${String(config.port)}/${encodeURIComponent(config.database)}` +
    `?connectTimeout=${String(config.connectTimeout)}`
  );
}

/**
 * Configuration fields safe to log
 */
export function describeConfig(
  config: DatabaseConfig,
): Omit<DatabaseConfig, "password"> {
  const { password, ...rest } = config;
  void password;
  return rest;
}
