/**
 * legacy-finance-reports - Test Mocks
 * 
 * Centralized mock factories for testing. All tests should import
 * mocks from this module for consistency.
 */

// Connection pool mocks
export {
    createMockPoolConnection,
    createMockConnectionPool
} from './pool.js';
export type { MockPoolConnection, MockConnectionPool } from './pool.js';

// Report row fixtures
export {
    createMockPaymentRow,
    createMockMisappliedPaymentRow,
    createMockColumnRow
} from './rows.js';

// Re-export types for convenience
export type { Row, TableInfo, ColumnInfo, HealthStatus } from '../../types/index.js';
