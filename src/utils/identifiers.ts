/**
 * legacy-finance-reports - Identifier Validation
 *
 * MySQL identifier rules as applied to reflected table names:
 * - Must start with a letter (a-z) or underscore (_)
 * - Can contain letters, digits (0-9), underscores, and dollar signs ($)
 * - Maximum length: 64 characters
 */

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_$]*$/;

const MAX_IDENTIFIER_LENGTH = 64;

/**
 * Error thrown when an identifier is invalid
 */
export class InvalidIdentifierError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly reason: string,
  ) {
    super(`Invalid identifier "${identifier}": ${reason}`);
    this.name = "InvalidIdentifierError";
  }
}

/**
 * Validate a MySQL identifier
 *
 * @throws InvalidIdentifierError if the identifier is invalid
 */
export function validateIdentifier(name: string): void {
  if (name.length === 0) {
    throw new InvalidIdentifierError(
      name,
      "Identifier must be a non-empty string",
    );
  }

  if (name.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidIdentifierError(
      name,
      `Identifier exceeds maximum length of ${String(MAX_IDENTIFIER_LENGTH)} characters`,
    );
  }

  if (!IDENTIFIER_PATTERN.test(name)) {
    if (name.includes(".")) {
      throw new InvalidIdentifierError(
        name,
        "Database-qualified names (db.table) are not supported; tables are resolved in the configured database",
      );
    }
    throw new InvalidIdentifierError(
      name,
      "Identifier contains invalid characters. Must start with a letter or underscore and contain only letters, digits, underscores, or dollar signs",
    );
  }
}

