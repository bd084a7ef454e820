/**
 * legacy-finance-reports - Legacy Repository
 *
 * Read-side data access over the legacy lesson, enrolment, payment and
 * invoice tables. Report methods log failures and return an empty result.
 */

import type { PoolConnection } from 'mysql2/promise';
import { z } from 'zod';
import type { DatabaseConfig } from '../config/DatabaseConfig.js';
import { ConnectionPool } from '../pool/ConnectionPool.js';
import { TableReflector } from '../schema/TableReflector.js';
import type {
    ConnectionTestResult,
    DateInput,
    EntityId,
    HealthStatus,
    PoolConfig,
    QueryParams,
    Row,
    TableInfo
} from '../types/database.js';
import { QueryError, TransactionError, ValidationError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import {
    AFFECTED_ENROLLMENTS_SQL,
    CURRENT_PAYMENT_APPLICATIONS_SQL,
    CUSTOMERS_WITH_MISAPPLIED_PAYMENTS_SQL,
    CUSTOMER_DETAILS_SQL,
    CUSTOMER_ENROLLMENTS_SQL,
    CUSTOMER_PAYMENTS_SQL,
    DEFAULT_PAYMENT_DATA_LIMIT,
    MAX_PAYMENT_DATA_LIMIT,
    MISAPPLIED_PAYMENTS_SQL,
    PAYMENT_CYCLE_DATA_SQL,
    PAYMENT_DETAILS_SQL,
    RELATED_ENROLMENT_DETAILS_SQL,
    buildEnrolmentDataQuery,
    buildInvoiceDataQuery,
    buildLessonDataQuery,
    buildPaymentDataQuery
} from './queries.js';
import type { Statement } from './queries.js';

const log = logger.forModule('REPOSITORY');
const queryLog = logger.forModule('QUERY');

// =============================================================================
// Input schemas
// =============================================================================

export const EntityIdSchema = z.union([
    z.string().trim().min(1, 'Identifier must not be empty'),
    z.number().int().positive()
]);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const DateInputSchema = z.union([
    z.string().regex(ISO_DATE, 'Expected a YYYY-MM-DD date').refine(isCalendarDate, 'Not a calendar date'),
    z.date().refine((value) => !Number.isNaN(value.getTime()), 'Invalid Date')
]);

export const LimitSchema = z.number().int().positive().max(MAX_PAYMENT_DATA_LIMIT);

export interface PaymentDataOptions {
    limit?: number | undefined;
    customerId?: EntityId | undefined;
}

/**
 * Work run inside a transaction or on a borrowed connection
 */
export interface RepositorySession {
    query(sql: string, params?: QueryParams): Promise<Row[]>;
}

function parseInput<T>(schema: z.ZodType<T>, value: unknown, field: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        const reason = result.error.issues.map((issue) => issue.message).join('; ');
        throw new ValidationError(`Invalid ${field}: ${reason}`, { field });
    }
    return result.data;
}

/**
 * Repository over the legacy reporting database
 */
export class LegacyRepository {
    private enginePool: ConnectionPool | null = null;
    private initializing: Promise<ConnectionPool> | null = null;
    /** Bumped by close() so a pool still initializing is not installed afterwards */
    private generation = 0;
    private readonly tables = new Map<string, Promise<TableInfo>>();
    private readonly reflector: TableReflector;

    constructor(
        private readonly config: DatabaseConfig,
        private readonly poolConfig: PoolConfig = {}
    ) {
        this.reflector = new TableReflector(async (sql, params) => {
            const pool = await this.pool();
            return pool.query(sql, params);
        });
    }

    // =========================================================================
    // Connection management
    // =========================================================================

    /**
     * The process-wide pool, created on first use
     */
    async pool(): Promise<ConnectionPool> {
        if (this.enginePool !== null) {
            return this.enginePool;
        }
        if (this.initializing === null) {
            const generation = this.generation;
            const pool = new ConnectionPool(this.config, this.poolConfig);
            this.initializing = pool.initialize().then(
                () => {
                    if (generation === this.generation) {
                        this.enginePool = pool;
                    }
                    return pool;
                },
                (error: unknown) => {
                    if (generation === this.generation) {
                        this.initializing = null;
                    }
                    throw error;
                }
            );
        }
        return this.initializing;
    }

    /**
     * Run work inside a transaction on a borrowed connection
     *
     * Commits when the work resolves and rolls back when it rejects; the
     * first error is rethrown either way.
     */
    async session<T>(work: (session: RepositorySession) => Promise<T>): Promise<T> {
        const pool = await this.pool();
        const connection = await pool.getConnection();

        try {
            await connection.beginTransaction();
            const result = await work(this.bind(pool, connection));
            try {
                await connection.commit();
            } catch (error) {
                throw new TransactionError(`Failed to commit session: ${errorMessage(error)}`);
            }
            return result;
        } catch (error) {
            log.error('Session error', { code: 'SESSION_FAILED', error: errorMessage(error) });
            try {
                await connection.rollback();
            } catch (rollbackError) {
                log.warn('Rollback failed', { error: errorMessage(rollbackError) });
            }
            throw error;
        } finally {
            pool.releaseConnection(connection);
        }
    }

    /**
     * Run work on a borrowed connection without a transaction
     */
    async connection<T>(work: (session: RepositorySession) => Promise<T>): Promise<T> {
        const pool = await this.pool();
        const connection = await pool.getConnection();

        try {
            return await work(this.bind(pool, connection));
        } catch (error) {
            log.error('Connection error', { code: 'CONNECTION_FAILED', error: errorMessage(error) });
            throw error;
        } finally {
            pool.releaseConnection(connection);
        }
    }

    /**
     * True when `SELECT 1` succeeds inside a session
     */
    async checkDatabaseConnection(): Promise<boolean> {
        try {
            await this.session((session) => session.query('SELECT 1'));
            return true;
        } catch (error) {
            log.error('Database connection check failed', {
                code: 'DB_CHECK_FAILED',
                error: errorMessage(error)
            });
            return false;
        }
    }

    async testConnection(): Promise<ConnectionTestResult> {
        try {
            const rows = await this.connection((session) =>
                session.query('SELECT VERSION() AS version')
            );
            const version = rows[0]?.['version'];
            return {
                connected: true,
                version: version === undefined || version === null ? null : String(version)
            };
        } catch (error) {
            return { connected: false, error: errorMessage(error) };
        }
    }

    /**
     * Run a raw parameterized statement
     *
     * @throws QueryError carrying the statement when it fails
     */
    async executeQuery(sql: string, params: QueryParams = {}): Promise<Row[]> {
        try {
            return await this.connection((session) => session.query(sql, params));
        } catch (error) {
            queryLog.error('Query execution failed', {
                code: 'QUERY_FAILED',
                sql: sql.trim().substring(0, 200),
                params,
                error: errorMessage(error)
            });
            throw new QueryError(`Query failed: ${errorMessage(error)}`, { sql });
        }
    }

    async getHealth(): Promise<HealthStatus> {
        try {
            const pool = await this.pool();
            return await pool.checkHealth();
        } catch (error) {
            return { connected: false, error: errorMessage(error) };
        }
    }

    /**
     * Shut the pool down; the repository reconnects on next use
     */
    async close(): Promise<void> {
        const ready = this.enginePool;
        const pending = this.initializing;
        this.generation++;
        this.enginePool = null;
        this.initializing = null;

        let pool = ready;
        if (pool === null && pending !== null) {
            pool = await pending.catch((error: unknown) => {
                log.debug('Pool initialization pending at close failed', {
                    error: errorMessage(error)
                });
                return null;
            });
        }
        if (pool !== null) {
            await pool.shutdown();
        }
    }

    // =========================================================================
    // Schema reflection
    // =========================================================================

    /**
     * Reflected table metadata, cached by name for the repository's lifetime
     */
    async getTable(tableName: string): Promise<TableInfo> {
        const cached = this.tables.get(tableName);
        if (cached !== undefined) {
            return cached;
        }

        const pending = this.reflector.reflect(tableName);
        this.tables.set(tableName, pending);
        try {
            return await pending;
        } catch (error) {
            this.tables.delete(tableName);
            throw error;
        }
    }

    // =========================================================================
    // Reports
    // =========================================================================

    async getCustomersWithMisappliedPayments(): Promise<Row[]> {
        return this.list('getCustomersWithMisappliedPayments', () => ({
            sql: CUSTOMERS_WITH_MISAPPLIED_PAYMENTS_SQL,
            params: {}
        }));
    }

    async getCustomerDetails(customerId: EntityId): Promise<Row | null> {
        return this.single('getCustomerDetails', () => ({
            sql: CUSTOMER_DETAILS_SQL,
            params: { customer_id: parseInput(EntityIdSchema, customerId, 'customerId') }
        }));
    }

    async getCustomerPayments(customerId: EntityId): Promise<Row[]> {
        return this.list('getCustomerPayments', () => ({
            sql: CUSTOMER_PAYMENTS_SQL,
            params: { customer_id: parseInput(EntityIdSchema, customerId, 'customerId') }
        }));
    }

    async getPaymentDetails(paymentId: EntityId): Promise<Row | null> {
        return this.single('getPaymentDetails', () => ({
            sql: PAYMENT_DETAILS_SQL,
            params: { payment_id: parseInput(EntityIdSchema, paymentId, 'paymentId') }
        }));
    }

    async getRelatedEnrolmentDetails(paymentId: EntityId): Promise<Row | null> {
        return this.single('getRelatedEnrolmentDetails', () => ({
            sql: RELATED_ENROLMENT_DETAILS_SQL,
            params: { payment_id: parseInput(EntityIdSchema, paymentId, 'paymentId') }
        }));
    }

    async getCurrentPaymentApplications(paymentId: EntityId): Promise<Row[]> {
        return this.list('getCurrentPaymentApplications', () => ({
            sql: CURRENT_PAYMENT_APPLICATIONS_SQL,
            params: { payment_id: parseInput(EntityIdSchema, paymentId, 'paymentId') }
        }));
    }

    /**
     * Enrolments ending on or before `endDate` without auto-renew that still
     * have lessons scheduled after it. `startDate` is bound but only checked
     * against `endDate`.
     */
    async getAffectedEnrollments(startDate: DateInput, endDate: DateInput): Promise<Row[]> {
        return this.list('getAffectedEnrollments', () => {
            const start = parseInput(DateInputSchema, startDate, 'startDate');
            const end = parseInput(DateInputSchema, endDate, 'endDate');
            if (toDay(start) > toDay(end)) {
                throw new ValidationError('startDate must not be after endDate', {
                    startDate: toDay(start),
                    endDate: toDay(end)
                });
            }
            return {
                sql: AFFECTED_ENROLLMENTS_SQL,
                params: { start_date: toDay(start), end_date: toDay(end) }
            };
        });
    }

    async getCustomerEnrollments(customerId: EntityId): Promise<Row[]> {
        return this.list('getCustomerEnrollments', () => ({
            sql: CUSTOMER_ENROLLMENTS_SQL,
            params: { customer_id: parseInput(EntityIdSchema, customerId, 'customerId') }
        }));
    }

    async fetchPaymentData(options: PaymentDataOptions = {}): Promise<Row[]> {
        return this.list('fetchPaymentData', () =>
            buildPaymentDataQuery(
                parseInput(LimitSchema, options.limit ?? DEFAULT_PAYMENT_DATA_LIMIT, 'limit'),
                optionalId(options.customerId)
            )
        );
    }

    async fetchPaymentCycleData(): Promise<Row[]> {
        return this.list('fetchPaymentCycleData', () => ({
            sql: PAYMENT_CYCLE_DATA_SQL,
            params: {}
        }));
    }

    async fetchMisappliedPayments(): Promise<Row[]> {
        return this.list('fetchMisappliedPayments', () => ({
            sql: MISAPPLIED_PAYMENTS_SQL,
            params: {}
        }));
    }

    async fetchEnrolmentData(customerId?: EntityId): Promise<Row[]> {
        return this.list('fetchEnrolmentData', () =>
            buildEnrolmentDataQuery(optionalId(customerId))
        );
    }

    async fetchLessonData(customerId?: EntityId): Promise<Row[]> {
        return this.list('fetchLessonData', () =>
            buildLessonDataQuery(optionalId(customerId))
        );
    }

    async fetchInvoiceData(customerId?: EntityId): Promise<Row[]> {
        return this.list('fetchInvoiceData', () =>
            buildInvoiceDataQuery(optionalId(customerId))
        );
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private bind(pool: ConnectionPool, connection: PoolConnection): RepositorySession {
        return {
            query: (sql, params) => pool.queryOn(connection, sql, params)
        };
    }

    private async list(operation: string, build: () => Statement): Promise<Row[]> {
        try {
            const { sql, params } = build();
            return await this.executeQuery(sql, params);
        } catch (error) {
            log.error(`Error in ${operation}`, {
                code: 'REPORT_FAILED',
                operation,
                error: errorMessage(error)
            });
            return [];
        }
    }

    private async single(operation: string, build: () => Statement): Promise<Row | null> {
        const rows = await this.list(operation, build);
        return rows[0] ?? null;
    }
}

function optionalId(value: EntityId | undefined): EntityId | undefined {
    return value === undefined ? undefined : parseInput(EntityIdSchema, value, 'customerId');
}

/**
 * Calendar day as `YYYY-MM-DD` (UTC for Date inputs)
 */
function toDay(value: DateInput): string {
    return typeof value === 'string' ? value : value.toISOString().slice(0, 10);
}
