/**
 * legacy-finance-reports - Legacy Finance Reports
 *
 * Reporting repository over the legacy lesson, enrolment, payment and
 * invoice database.
 *
 * @module legacy-finance-reports
 */

// Export types
export * from "./types/index.js";

// Export configuration
export {
  DEFAULT_DATABASE_CONFIG,
  DatabaseConfigSchema,
  createDatabaseConfig,
  databaseConfigFromEnv,
  parseConnectionUrl,
  toConnectionUri,
  describeConfig,
} from "./config/DatabaseConfig.js";
export type {
  DatabaseConfig,
  DatabaseConfigInput,
} from "./config/DatabaseConfig.js";

// Export repository and services
export { LegacyRepository } from "./repositories/LegacyRepository.js";
export type {
  PaymentDataOptions,
  RepositorySession,
} from "./repositories/LegacyRepository.js";
export { FinancialReportsService } from "./services/FinancialReportsService.js";
export type { ReportSource } from "./services/FinancialReportsService.js";
export { REPORTS, findReport, runReport } from "./reports/catalog.js";
export type {
  ReportDefinition,
  ReportArgument,
  ReportResult,
} from "./reports/catalog.js";

// Export utilities
export { ConnectionPool } from "./pool/ConnectionPool.js";
export { TableReflector } from "./schema/TableReflector.js";
export {
  InvalidIdentifierError,
  validateIdentifier,
} from "./utils/identifiers.js";
export { logger } from "./utils/logger.js";
export type { LogLevel, LogModule, LogContext } from "./utils/logger.js";
