/**
 * legacy-finance-reports - CLI Output
 *
 * JSON rendering for stdout. Dates become ISO strings, bigints decimal
 * strings and binary columns base64.
 */

export function toPlain(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("base64");
  }
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, toPlain(entry)]),
    );
  }
  return value;
}

export function formatJson(value: unknown): string {
  return JSON.stringify(toPlain(value), null, 2);
}
