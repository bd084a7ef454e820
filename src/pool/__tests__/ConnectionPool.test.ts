/**
 * Unit tests for Connection Pool
 *
 * Tests health monitoring, graceful shutdown, and statistics tracking.
 * Uses a mocked mysql2 pool to test behavior without a real database.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createDatabaseConfig } from '../../config/DatabaseConfig.js';
import { ConnectionError, PoolError } from '../../types/errors.js';

// Create mock functions that we can reference
const mockConnectionQuery = vi.fn();
const mockConnectionRelease = vi.fn();

const mockGetConnection = vi.fn();
const mockPoolQuery = vi.fn();
const mockPoolEnd = vi.fn();
const mockPoolOn = vi.fn();
const mockCreatePool = vi.fn();

// Mock mysql2 before importing ConnectionPool
vi.mock('mysql2/promise', () => ({
    default: { createPool: (...args: unknown[]): unknown => mockCreatePool(...args) }
}));

// Mock the logger to avoid console output
vi.mock('../../utils/logger.js', () => {
    const moduleLogger = {
        debug: vi.fn(),
        info: vi.fn(),
        notice: vi.fn(),
        warn: vi.fn(),
        warning: vi.fn(),
        error: vi.fn(),
        critical: vi.fn()
    };
    return { logger: { ...moduleLogger, forModule: () => moduleLogger } };
});

// Import after mocking
import { ConnectionPool, toRow, toSqlValue } from '../ConnectionPool.js';

function handlerFor(event: string): (() => void) | undefined {
    const call = mockPoolOn.mock.calls.find((c) => c[0] === event);
    const handler: unknown = call?.[1];
    return typeof handler === 'function' ? () => { handler(); } : undefined;
}

describe('ConnectionPool', () => {
    let pool: ConnectionPool;

    beforeEach(() => {
        vi.clearAllMocks();

        mockConnectionQuery.mockResolvedValue([[{ version: '8.0.36' }], []]);
        mockConnectionRelease.mockReturnValue(undefined);
        mockGetConnection.mockResolvedValue({
            query: mockConnectionQuery,
            release: mockConnectionRelease
        });
        mockPoolQuery.mockResolvedValue([[], []]);
        mockPoolEnd.mockResolvedValue(undefined);
        mockPoolOn.mockReturnValue(undefined);
        mockCreatePool.mockReturnValue({
            getConnection: mockGetConnection,
            query: mockPoolQuery,
            end: mockPoolEnd,
            on: mockPoolOn
        });

        pool = new ConnectionPool(
            createDatabaseConfig({
                host: 'db.test',
                port: 3306,
                user: 'report',
                password: 'test-secret',
                database: 'legacy_test',
                connectTimeout: 5
            })
        );
    });

    describe('Initialization', () => {
        it('should initialize successfully', async () => {
            await pool.initialize();
            expect(pool.isInitialized()).toBe(true);
        });

        it('should pass connection settings to mysql2', async () => {
            await pool.initialize();

            expect(mockCreatePool).toHaveBeenCalledWith(
                expect.objectContaining({
                    host: 'db.test',
                    port: 3306,
                    user: 'report',
                    password: 'test-secret',
                    database: 'legacy_test',
                    connectTimeout: 5000,
                    connectionLimit: 10,
                    idleTimeout: 3_600_000,
                    namedPlaceholders: true
                })
            );
        });

        it('should prefer the pool connection limit over the config', async () => {
            const limited = new ConnectionPool(createDatabaseConfig(), { connectionLimit: 3 });
            await limited.initialize();

            expect(mockCreatePool).toHaveBeenCalledWith(
                expect.objectContaining({ connectionLimit: 3 })
            );
        });

        it('should not reinitialize if already initialized', async () => {
            await pool.initialize();
            await pool.initialize();

            expect(mockCreatePool).toHaveBeenCalledTimes(1);
            expect(pool.isInitialized()).toBe(true);
        });

        it('should probe the server version and release the connection', async () => {
            await pool.initialize();

            expect(mockConnectionQuery).toHaveBeenCalledWith('SELECT VERSION() AS version');
            expect(mockConnectionRelease).toHaveBeenCalledTimes(1);
        });
    });

    describe('Initialization Errors', () => {
        it('should throw ConnectionError when initial connection fails', async () => {
            mockGetConnection.mockRejectedValueOnce(new Error('Connection refused'));

            await expect(pool.initialize()).rejects.toThrow(ConnectionError);
        });

        it('should include the driver message', async () => {
            mockGetConnection.mockRejectedValueOnce(new Error('Access denied'));

            await expect(pool.initialize()).rejects.toThrow(
                'Failed to connect to MySQL: Access denied'
            );
        });

        it('should handle non-Error exceptions during initialization', async () => {
            mockGetConnection.mockRejectedValueOnce('Unknown failure');

            await expect(pool.initialize()).rejects.toThrow(
                'Failed to connect to MySQL: Unknown failure'
            );
        });

        it('should end the half-built pool on failure', async () => {
            mockGetConnection.mockRejectedValueOnce(new Error('Auth failure'));

            await expect(pool.initialize()).rejects.toThrow();

            expect(mockPoolEnd).toHaveBeenCalledTimes(1);
            expect(pool.isInitialized()).toBe(false);
        });

        it('should still release the probe connection when the probe fails', async () => {
            mockConnectionQuery.mockRejectedValueOnce(new Error('Lost connection'));

            await expect(pool.initialize()).rejects.toThrow(ConnectionError);
            expect(mockConnectionRelease).toHaveBeenCalledTimes(1);
        });
    });

    describe('Queries', () => {
        it('should return rows as plain objects', async () => {
            await pool.initialize();
            mockPoolQuery.mockResolvedValueOnce([[{ id: 1, name: 'Ada' }], []]);

            const rows = await pool.query('SELECT id, name FROM student');

            expect(rows).toEqual([{ id: 1, name: 'Ada' }]);
        });

        it('should pass named parameters through', async () => {
            await pool.initialize();

            await pool.query('SELECT 1 FROM payment WHERE id = :payment_id', { payment_id: 9 });

            expect(mockPoolQuery).toHaveBeenCalledWith(
                'SELECT 1 FROM payment WHERE id = :payment_id',
                { payment_id: 9 }
            );
        });

        it('should rethrow driver errors', async () => {
            await pool.initialize();
            mockPoolQuery.mockRejectedValueOnce(new Error('Unknown column'));

            await expect(pool.query('SELECT nope')).rejects.toThrow('Unknown column');
        });

        it('should run statements on a borrowed connection', async () => {
            await pool.initialize();
            const connection = await pool.getConnection();
            mockConnectionQuery.mockResolvedValueOnce([[{ one: 1 }], []]);

            const rows = await pool.queryOn(connection, 'SELECT 1 AS one');

            expect(rows).toEqual([{ one: 1 }]);
        });
    });

    describe('Statistics Tracking', () => {
        it('should track total query count', async () => {
            await pool.initialize();

            await pool.query('SELECT 1');
            await pool.query('SELECT 2');

            expect(pool.getStats().totalQueries).toBe(2);
        });

        it('should track connections from pool events', async () => {
            await pool.initialize();

            handlerFor('connection')?.();
            handlerFor('connection')?.();
            handlerFor('acquire')?.();

            expect(pool.getStats()).toEqual({
                total: 2,
                active: 1,
                idle: 1,
                waiting: 0,
                totalQueries: 0
            });

            handlerFor('release')?.();

            expect(pool.getStats().active).toBe(0);
            expect(pool.getStats().idle).toBe(2);
        });

        it('should count queued requests until a connection is handed out', async () => {
            await pool.initialize();

            handlerFor('enqueue')?.();
            handlerFor('enqueue')?.();
            expect(pool.getStats().waiting).toBe(2);

            handlerFor('acquire')?.();
            expect(pool.getStats().waiting).toBe(1);
        });

        it('should not count down requests that never queued', async () => {
            await pool.initialize();

            handlerFor('acquire')?.();
            await pool.getConnection();
            await pool.query('SELECT 1');

            expect(pool.getStats().waiting).toBe(0);

            handlerFor('enqueue')?.();
            await pool.getConnection();

            expect(pool.getStats().waiting).toBe(1);
        });

        it('should clear queued requests on shutdown', async () => {
            await pool.initialize();
            handlerFor('enqueue')?.();

            await pool.shutdown();

            expect(pool.getStats().waiting).toBe(0);
        });

        it('should return a snapshot', async () => {
            await pool.initialize();

            const stats = pool.getStats();
            stats.total = 99;

            expect(pool.getStats().total).toBe(0);
        });
    });

    describe('Health Monitoring', () => {
        it('should report unhealthy when not initialized', async () => {
            const health = await pool.checkHealth();

            expect(health.connected).toBe(false);
            expect(health.error).toBe('Pool not initialized');
        });

        it('should report version and database when healthy', async () => {
            await pool.initialize();
            mockPoolQuery.mockResolvedValueOnce([
                [{ version: '8.0.36', current_database: 'legacy_test' }],
                []
            ]);

            const health = await pool.checkHealth();

            expect(health.connected).toBe(true);
            expect(health.version).toBe('8.0.36');
            expect(health.details).toEqual({ database: 'legacy_test' });
            expect(health.latencyMs).toBeGreaterThanOrEqual(0);
            expect(health.poolStats?.totalQueries).toBe(0);
        });

        it('should report unhealthy on query failure', async () => {
            await pool.initialize();
            mockPoolQuery.mockRejectedValueOnce(new Error('Connection refused'));

            const health = await pool.checkHealth();

            expect(health.connected).toBe(false);
            expect(health.error).toBe('Connection refused');
        });
    });

    describe('Graceful Shutdown', () => {
        it('should set shutting down state', async () => {
            await pool.initialize();
            expect(pool.isClosing()).toBe(false);

            await pool.shutdown();
            expect(pool.isClosing()).toBe(true);
            expect(pool.isInitialized()).toBe(false);
        });

        it('should call pool.end() on shutdown', async () => {
            await pool.initialize();
            await pool.shutdown();

            expect(mockPoolEnd).toHaveBeenCalledTimes(1);
        });

        it('should reject new connections after shutdown', async () => {
            await pool.initialize();
            await pool.shutdown();

            await expect(pool.getConnection()).rejects.toThrow(PoolError);
            await expect(pool.getConnection()).rejects.toThrow('not initialized');
        });

        it('should report unhealthy after shutdown', async () => {
            await pool.initialize();
            await pool.shutdown();

            const health = await pool.checkHealth();
            expect(health.connected).toBe(false);
            expect(health.error).toBe('Pool is shutting down');
        });

        it('should throw PoolError when acquiring during shutdown', async () => {
            await pool.initialize();

            const shutdownPromise = pool.shutdown();

            await expect(pool.getConnection()).rejects.toThrow('Connection pool is shutting down');

            await shutdownPromise;
        });

        it('should handle shutdown when not initialized', async () => {
            await expect(pool.shutdown()).resolves.toBeUndefined();
        });

        it('should be able to initialize again after shutdown', async () => {
            await pool.initialize();
            await pool.shutdown();
            await pool.initialize();

            expect(pool.isInitialized()).toBe(true);
            expect(mockCreatePool).toHaveBeenCalledTimes(2);
        });
    });

    describe('Connection Management', () => {
        it('should throw when querying uninitialized pool', async () => {
            await expect(pool.query('SELECT 1')).rejects.toThrow(PoolError);
        });

        it('should wrap acquire failures in PoolError', async () => {
            await pool.initialize();
            mockGetConnection.mockRejectedValueOnce(new Error('Queue limit reached'));

            await expect(pool.getConnection()).rejects.toThrow(
                'Failed to acquire connection: Queue limit reached'
            );
        });

        it('should release connections properly', async () => {
            await pool.initialize();
            mockConnectionRelease.mockClear();

            const connection = await pool.getConnection();
            pool.releaseConnection(connection);

            expect(mockConnectionRelease).toHaveBeenCalledTimes(1);
        });

        it('should not throw when release fails', async () => {
            await pool.initialize();
            const connection = await pool.getConnection();
            mockConnectionRelease.mockImplementationOnce(() => {
                throw new Error('Already released');
            });

            expect(() => { pool.releaseConnection(connection); }).not.toThrow();
        });
    });
});

describe('toSqlValue', () => {
    it('should keep scalars, dates and buffers', () => {
        const date = new Date('2024-01-02T00:00:00Z');
        const buffer = Buffer.from('ab');

        expect(toSqlValue('x')).toBe('x');
        expect(toSqlValue(12n)).toBe(12n);
        expect(toSqlValue(false)).toBe(false);
        expect(toSqlValue(date)).toBe(date);
        expect(toSqlValue(buffer)).toBe(buffer);
    });

    it('should map undefined to null', () => {
        expect(toSqlValue(undefined)).toBeNull();
    });

    it('should serialize parsed JSON columns', () => {
        expect(toSqlValue({ tags: ['a'] })).toBe('{"tags":["a"]}');
    });
});

describe('toRow', () => {
    it('should keep projection order', () => {
        expect(Object.keys(toRow({ b: 1, a: 2, c: null }))).toEqual(['b', 'a', 'c']);
    });
});
