/**
 * legacy-finance-reports - Table Reflection
 *
 * Reads column metadata for a single table of the connected database
 * from information_schema.
 */

import type {
  ColumnInfo,
  QueryParams,
  Row,
  SqlValue,
  TableInfo,
} from "../types/database.js";
import { TableNotFoundError, ValidationError } from "../types/errors.js";
import {
  InvalidIdentifierError,
  validateIdentifier,
} from "../utils/identifiers.js";
import { logger } from "../utils/logger.js";

const log = logger.forModule("SCHEMA");

/**
 * Anything that can run a parameterized SELECT
 */
export type RowQuery = (sql: string, params?: QueryParams) => Promise<Row[]>;

export const REFLECT_COLUMNS_SQL = `
  SELECT
    TABLE_SCHEMA AS table_schema,
    COLUMN_NAME AS name,
    DATA_TYPE AS data_type,
    COLUMN_TYPE AS column_type,
    IS_NULLABLE AS is_nullable,
    COLUMN_KEY AS column_key,
    COLUMN_DEFAULT AS column_default,
    EXTRA AS extra,
    COLUMN_COMMENT AS column_comment
  FROM information_schema.COLUMNS
  WHERE TABLE_SCHEMA = DATABASE()
    AND TABLE_NAME = :table_name
  ORDER BY ORDINAL_POSITION
`;

function text(value: SqlValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function toColumnInfo(row: Row): ColumnInfo {
  const comment = text(row["column_comment"]);
  const defaultValue = row["column_default"];
  return {
    name: text(row["name"]),
    type: text(row["data_type"]).toLowerCase(),
    columnType: text(row["column_type"]),
    nullable: text(row["is_nullable"]).toUpperCase() === "YES",
    primaryKey: text(row["column_key"]).toUpperCase() === "PRI",
    defaultValue:
      defaultValue === null || defaultValue === undefined
        ? null
        : text(defaultValue),
    autoIncrement: text(row["extra"]).toLowerCase().includes("auto_increment"),
    ...(comment ? { comment } : {}),
  };
}

export class TableReflector {
  constructor(private readonly runQuery: RowQuery) {}

  /**
   * Reflect one table by name
   *
   * @throws ValidationError for a malformed name
   * @throws TableNotFoundError when the table has no columns
   */
  async reflect(tableName: string): Promise<TableInfo> {
    try {
      validateIdentifier(tableName);
    } catch (error) {
      if (error instanceof InvalidIdentifierError) {
        throw new ValidationError(error.message, { table: tableName });
      }
      throw error;
    }

    log.debug("Reflecting table", { entityId: tableName });

    const rows = await this.runQuery(REFLECT_COLUMNS_SQL, {
      table_name: tableName,
    });

    const first = rows[0];
    if (first === undefined) {
      throw new TableNotFoundError(tableName);
    }

    const columns = rows.map(toColumnInfo);

    return {
      name: tableName,
      schema: text(first["table_schema"]),
      columns,
      primaryKey: columns.filter((c) => c.primaryKey).map((c) => c.name),
    };
  }
}
