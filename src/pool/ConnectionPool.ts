/**
 * legacy-finance-reports - Connection Pool Manager
 *
 * Wraps mysql2 connection pooling with health monitoring,
 * statistics tracking, and graceful shutdown support.
 */

import mysql from 'mysql2/promise';
import type {
    Pool,
    PoolConnection,
    PoolOptions,
    RowDataPacket,
} from 'mysql2/promise';
import type { DatabaseConfig } from '../config/DatabaseConfig.js';
import { describeConfig } from '../config/DatabaseConfig.js';
import type {
    HealthStatus,
    PoolConfig,
    PoolStats,
    QueryParams,
    Row,
    SqlValue,
} from '../types/database.js';
import { ConnectionError, PoolError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('POOL');

/** Recycle idle connections after an hour, like the server's wait_timeout */
const DEFAULT_IDLE_TIMEOUT_MS = 3_600_000;

/**
 * Narrow a driver value to a column scalar. JSON columns arrive parsed and are
 * re-serialized so every row stays flat.
 */
export function toSqlValue(value: unknown): SqlValue {
    if (value === null || value === undefined) return null;
    if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'bigint' ||
        typeof value === 'boolean'
    ) {
        return value;
    }
    if (value instanceof Date || Buffer.isBuffer(value)) return value;
    return JSON.stringify(value);
}

/**
 * Copy a driver row into a plain column mapping, keeping projection order
 */
export function toRow(packet: Record<string, unknown>): Row {
    const row: Row = {};
    for (const [column, value] of Object.entries(packet)) {
        row[column] = toSqlValue(value);
    }
    return row;
}

/**
 * Connection pool wrapper with statistics and health monitoring
 */
export class ConnectionPool {
    private pool: Pool | null = null;
    private readonly config: DatabaseConfig;
    private readonly poolConfig: PoolConfig;
    private stats: PoolStats = {
        total: 0,
        active: 0,
        idle: 0,
        waiting: 0,
        totalQueries: 0,
    };
    private shuttingDown = false;

    constructor(config: DatabaseConfig, poolConfig: PoolConfig = {}) {
        this.config = config;
        this.poolConfig = poolConfig;
    }

    /**
     * Create the pool and probe the server once
     */
    async initialize(): Promise<void> {
        if (this.pool !== null) {
            log.warn('Connection pool already initialized');
            return;
        }

        log.info('Initializing MySQL connection pool', {
            ...describeConfig(this.config),
        });

        const options: PoolOptions = {
            host: this.config.host,
            port: this.config.port,
            user: this.config.user,
            password: this.config.password,
            database: this.config.database,
            connectTimeout: this.config.connectTimeout * 1000,
            connectionLimit:
                this.poolConfig.connectionLimit ?? this.config.connectionLimit,
            waitForConnections: this.poolConfig.waitForConnections ?? true,
            idleTimeout: this.poolConfig.idleTimeoutMillis ?? DEFAULT_IDLE_TIMEOUT_MS,
            enableKeepAlive: true,
            namedPlaceholders: true,
            supportBigNumbers: true,
        };

        try {
            this.pool = mysql.createPool(options);
            this.shuttingDown = false;

            this.pool.on('connection', () => {
                this.stats.total++;
                this.stats.idle++;
                log.debug('New connection established');
            });

            // Queued requests are served before new ones, so every acquire
            // while requests wait hands a connection to one of them.
            this.pool.on('acquire', () => {
                this.stats.active++;
                this.stats.idle = Math.max(0, this.stats.idle - 1);
                this.stats.waiting = Math.max(0, this.stats.waiting - 1);
            });

            this.pool.on('release', () => {
                this.stats.active = Math.max(0, this.stats.active - 1);
                this.stats.idle++;
            });

            this.pool.on('enqueue', () => {
                this.stats.waiting++;
            });

            const connection = await this.pool.getConnection();
            try {
                const [rows] = await connection.query<RowDataPacket[]>(
                    'SELECT VERSION() AS version',
                );
                log.info('MySQL connection pool initialized', {
                    version: String(rows[0]?.['version'] ?? 'unknown'),
                });
            } finally {
                connection.release();
            }
        } catch (error) {
            if (this.pool !== null) {
                try {
                    await this.pool.end();
                } catch (endError) {
                    log.debug('Ignoring error while ending half-built pool', {
                        error: errorMessage(endError),
                    });
                }
                this.pool = null;
            }
            const message = errorMessage(error);
            log.error('Failed to initialize connection pool', {
                code: 'DB_CONNECT_FAILED',
                error: message,
            });
            throw new ConnectionError(`Failed to connect to MySQL: ${message}`, {
                host: this.config.host,
                port: this.config.port,
            });
        }
    }

    /**
     * Borrow a connection from the pool
     */
    async getConnection(): Promise<PoolConnection> {
        const pool = this.requirePool();

        try {
            return await pool.getConnection();
        } catch (error) {
            throw new PoolError(`Failed to acquire connection: ${errorMessage(error)}`);
        }
    }

    /**
     * Return a connection to the pool
     */
    releaseConnection(connection: PoolConnection): void {
        try {
            connection.release();
        } catch (error) {
            log.warn('Error releasing connection', { error: errorMessage(error) });
        }
    }

    /**
     * Run a statement on any pooled connection
     */
    async query(sql: string, params?: QueryParams): Promise<Row[]> {
        const pool = this.requirePool();
        const startTime = Date.now();
        this.stats.totalQueries++;

        try {
            const [rows] = await pool.query<RowDataPacket[]>(sql, params);
            log.debug('Query executed', {
                sql: sql.trim().substring(0, 100),
                rowCount: rows.length,
                durationMs: Date.now() - startTime,
            });
            return rows.map(toRow);
        } catch (error) {
            log.error('Query failed', {
                sql: sql.trim().substring(0, 100),
                error: errorMessage(error),
            });
            throw error;
        }
    }

    /**
     * Run a statement on a borrowed connection
     */
    async queryOn(
        connection: PoolConnection,
        sql: string,
        params?: QueryParams,
    ): Promise<Row[]> {
        this.stats.totalQueries++;
        const [rows] = await connection.query<RowDataPacket[]>(sql, params);
        return rows.map(toRow);
    }

    getStats(): PoolStats {
        return { ...this.stats };
    }

    /**
     * Probe the server; never throws
     */
    async checkHealth(): Promise<HealthStatus> {
        if (this.pool === null || this.shuttingDown) {
            return {
                connected: false,
                error: this.shuttingDown
                    ? 'Pool is shutting down'
                    : 'Pool not initialized',
            };
        }

        const startTime = Date.now();

        try {
            const [rows] = await this.pool.query<RowDataPacket[]>(
                'SELECT VERSION() AS version, DATABASE() AS current_database',
            );
            const latencyMs = Date.now() - startTime;
            const row = rows[0];

            return {
                connected: true,
                latencyMs,
                version: row ? String(row['version']) : undefined,
                poolStats: this.getStats(),
                details: {
                    database: row?.['current_database'] ?? null,
                },
            };
        } catch (error) {
            return {
                connected: false,
                error: errorMessage(error),
                latencyMs: Date.now() - startTime,
            };
        }
    }

    /**
     * End every pooled connection
     */
    async shutdown(): Promise<void> {
        if (this.pool === null) {
            return;
        }

        log.info('Shutting down connection pool...');
        this.shuttingDown = true;

        try {
            await this.pool.end();
            this.pool = null;
            this.stats.waiting = 0;
            log.info('Connection pool shut down successfully');
        } catch (error) {
            log.error('Error during pool shutdown', { error: errorMessage(error) });
            throw error;
        }
    }

    isInitialized(): boolean {
        return this.pool !== null && !this.shuttingDown;
    }

    isClosing(): boolean {
        return this.shuttingDown;
    }

    private requirePool(): Pool {
        if (this.pool === null) {
            throw new PoolError('Connection pool not initialized');
        }
        if (this.shuttingDown) {
            throw new PoolError('Connection pool is shutting down');
        }
        return this.pool;
    }
}
