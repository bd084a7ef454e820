/**
 * legacy-finance-reports - Financial Reports Service
 *
 * Aggregations the dashboard draws from repository rows.
 */

import type { LegacyRepository } from '../repositories/LegacyRepository.js';
import type { EntityId, Row, SqlValue } from '../types/database.js';
import type {
    AccountImpact,
    BucketCount,
    Customer360,
    MisalignmentBucket,
    MisapplicationSummary,
    PaymentStatistics,
    TimelinePoint
} from '../types/reports.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('SERVICE');

export const MISALIGNMENT_BUCKETS: readonly MisalignmentBucket[] = ['16-30', '31-60', '61-90', '>90'];

const TOP_ACCOUNTS = 5;

/**
 * Repository methods the service reads from
 */
export type ReportSource = Pick<
    LegacyRepository,
    | 'fetchEnrolmentData'
    | 'fetchLessonData'
    | 'fetchInvoiceData'
    | 'fetchPaymentData'
    | 'fetchMisappliedPayments'
    | 'getCustomerPayments'
>;

/**
 * Numeric value of a column; DECIMAL columns arrive as strings
 */
export function toNumber(value: SqlValue | undefined): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'bigint') {
        return Number(value);
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

/**
 * Round to cents
 */
function money(value: number): number {
    return Math.round(value * 100) / 100;
}

export function bucketFor(days: number): MisalignmentBucket {
    if (days <= 30) return '16-30';
    if (days <= 60) return '31-60';
    if (days <= 90) return '61-90';
    return '>90';
}

/**
 * `YYYY-MM` of a date column, or null when it is not a date
 */
export function monthOf(value: SqlValue | undefined): string | null {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 7);
    }
    if (typeof value === 'string') {
        const match = /^(\d{4}-\d{2})/.exec(value);
        return match?.[1] ?? null;
    }
    return null;
}

export class FinancialReportsService {
    constructor(private readonly repository: ReportSource) {}

    async getCustomer360(customerId: EntityId): Promise<Customer360> {
        const [enrolments, lessons, invoices, payments] = await Promise.all([
            this.repository.fetchEnrolmentData(customerId),
            this.repository.fetchLessonData(customerId),
            this.repository.fetchInvoiceData(customerId),
            this.repository.fetchPaymentData({ customerId })
        ]);

        const isEmpty =
            enrolments.length === 0 &&
            lessons.length === 0 &&
            invoices.length === 0 &&
            payments.length === 0;

        if (isEmpty) {
            log.warning('No data found for customer', {
                operation: 'getCustomer360',
                entityId: String(customerId)
            });
        }

        return { customerId, enrolments, lessons, invoices, payments, isEmpty };
    }

    async getCustomerPaymentStatistics(customerId: EntityId): Promise<PaymentStatistics> {
        const payments = await this.repository.getCustomerPayments(customerId);

        const amounts = payments
            .map((row) => toNumber(row['amount']))
            .filter((amount): amount is number => amount !== null);
        const total = amounts.reduce((sum, amount) => sum + amount, 0);

        return {
            totalPayments: payments.length,
            totalAmountPaid: money(total),
            averagePaymentAmount: amounts.length === 0 ? 0 : money(total / amounts.length)
        };
    }

    async getMisapplicationSummary(): Promise<MisapplicationSummary> {
        const rows = await this.repository.fetchMisappliedPayments();
        log.info('Summarizing misapplied payments', { rowCount: rows.length });

        const days = rows
            .map((row) => toNumber(row['days_difference']))
            .filter((value): value is number => value !== null);
        const applied = rows.reduce((sum, row) => sum + (toNumber(row['applied_amount']) ?? 0), 0);
        const accounts = new Set(rows.map((row) => accountKey(row)).filter((key) => key !== null));

        return {
            metrics: {
                totalMisapplied: rows.length,
                affectedAccounts: accounts.size,
                totalAppliedAmount: money(applied),
                averageDaysMisaligned:
                    days.length === 0
                        ? 0
                        : Math.round((days.reduce((sum, value) => sum + value, 0) / days.length) * 10) / 10
            },
            topAccounts: topAccounts(rows),
            timeline: timeline(rows),
            distribution: distribution(days)
        };
    }
}

function accountKey(row: Row): string | null {
    const value = row['account_id'];
    return value === undefined || value === null ? null : String(value);
}

function topAccounts(rows: Row[]): AccountImpact[] {
    const byAccount = new Map<string, AccountImpact>();

    for (const row of rows) {
        const accountId = accountKey(row);
        if (accountId === null) continue;

        const impact = byAccount.get(accountId) ?? {
            accountId,
            customerName: null,
            paymentCount: 0,
            totalAppliedAmount: 0
        };
        const name = row['customer_name'];
        if (impact.customerName === null && typeof name === 'string') {
            impact.customerName = name;
        }
        impact.paymentCount++;
        impact.totalAppliedAmount += toNumber(row['applied_amount']) ?? 0;
        byAccount.set(accountId, impact);
    }

    return [...byAccount.values()]
        .map((impact) => ({ ...impact, totalAppliedAmount: money(impact.totalAppliedAmount) }))
        .sort(
            (a, b) =>
                b.paymentCount - a.paymentCount ||
                b.totalAppliedAmount - a.totalAppliedAmount ||
                a.accountId.localeCompare(b.accountId)
        )
        .slice(0, TOP_ACCOUNTS);
}

function timeline(rows: Row[]): TimelinePoint[] {
    const counts = new Map<string, number>();
    for (const row of rows) {
        const month = monthOf(row['payment_date']);
        if (month === null) continue;
        counts.set(month, (counts.get(month) ?? 0) + 1);
    }
    return [...counts.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([month, count]) => ({ month, count }));
}

function distribution(days: number[]): BucketCount[] {
    const counts = new Map<MisalignmentBucket, number>();
    for (const value of days) {
        const bucket = bucketFor(value);
        counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
    }
    return MISALIGNMENT_BUCKETS.map((bucket) => ({ bucket, count: counts.get(bucket) ?? 0 }));
}
