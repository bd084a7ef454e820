/**
 * legacy-finance-reports - CLI Option Resolution Tests
 */

import { describe, it, expect } from "vitest";
import { buildDatabaseConfig, reportArgs, resolveLogLevel } from "../args.js";
import { ValidationError } from "../../types/errors.js";

describe("buildDatabaseConfig", () => {
  it("should use defaults without options or environment", () => {
    expect(buildDatabaseConfig({}, {})).toEqual({
      host: "localhost",
      port: 33060,
      user: "root",
      password: "root",
      database: "smw_legacy_full",
      connectTimeout: 10,
      connectionLimit: 10,
    });
  });

  it("should fall back to environment variables", () => {
    const config = buildDatabaseConfig(
      {},
      { DB_HOST: "db.internal", DB_PASSWORD: "test-secret" },
    );

    expect(config.host).toBe("db.internal");
    expect(config.password).toBe("test-secret");
  });

  it("should prioritize --url over environment variables", () => {
    const config = buildDatabaseConfig(
      { url: "mysql://report@url.internal:3307/reports" },
      { DB_HOST: "env.internal", DB_NAME: "env_db", DB_CONNECT_TIMEOUT: "4" },
    );

    expect(config).toMatchObject({
      host: "url.internal",
      port: 3307,
      user: "report",
      database: "reports",
      connectTimeout: 4,
    });
  });

  it("should prioritize individual flags over --url", () => {
    const config = buildDatabaseConfig(
      {
        url: "mysql://report@url.internal:3307/reports",
        host: "flag.internal",
        poolMax: 4,
        connectTimeout: 2,
      },
      {},
    );

    expect(config).toMatchObject({
      host: "flag.internal",
      port: 3307,
      connectTimeout: 2,
      connectionLimit: 4,
    });
  });

  it("should reject invalid values", () => {
    expect(() => buildDatabaseConfig({ port: 0 }, {})).toThrow(
      ValidationError,
    );
  });
});

describe("resolveLogLevel", () => {
  it("should return undefined when nothing is set", () => {
    expect(resolveLogLevel(undefined, {})).toBeUndefined();
  });

  it("should prefer the option over LOG_LEVEL", () => {
    expect(resolveLogLevel("debug", { LOG_LEVEL: "error" })).toBe("debug");
    expect(resolveLogLevel(undefined, { LOG_LEVEL: "error" })).toBe("error");
  });

  it("should accept any case", () => {
    expect(resolveLogLevel("WARNING", {})).toBe("warning");
  });

  it("should reject unknown levels", () => {
    expect(() => resolveLogLevel("verbose", {})).toThrow(
      "Invalid log level 'verbose', expected one of: debug, info, notice, warning, error, critical, alert, emergency",
    );
  });
});

describe("reportArgs", () => {
  it("should map flags to argument names and drop unset ones", () => {
    expect(
      reportArgs({ customer: "42", start: "2024-01-01", limit: 10 }),
    ).toEqual({ customerId: "42", startDate: "2024-01-01", limit: 10 });
  });

  it("should return an empty record without flags", () => {
    expect(reportArgs({})).toEqual({});
  });
});
