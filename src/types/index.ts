/**
 * legacy-finance-reports - Type Definitions
 *
 * Re-exports of the database, report and error types.
 */

export type {
    SqlValue,
    Row,
    QueryParams,
    EntityId,
    DateInput,
    PoolConfig,
    PoolStats,
    HealthStatus,
    ConnectionTestResult,
    ColumnInfo,
    TableInfo
} from './database.js';

export type {
    Customer360,
    PaymentStatistics,
    MisalignmentBucket,
    MisapplicationMetrics,
    AccountImpact,
    TimelinePoint,
    BucketCount,
    MisapplicationSummary
} from './reports.js';

export {
    LegacyRepositoryError,
    ConnectionError,
    PoolError,
    QueryError,
    TransactionError,
    ValidationError,
    TableNotFoundError,
    errorMessage
} from './errors.js';
