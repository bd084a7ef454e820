/**
 * legacy-finance-reports - Report Types
 *
 * Aggregates computed over repository rows.
 */

import type { EntityId, Row } from './database.js';

/**
 * Everything known about one customer in the account/invoice schema
 */
export interface Customer360 {
    customerId: EntityId;
    enrolments: Row[];
    lessons: Row[];
    invoices: Row[];
    payments: Row[];
    /** No rows in any of the four datasets */
    isEmpty: boolean;
}

export interface PaymentStatistics {
    totalPayments: number;
    totalAmountPaid: number;
    averagePaymentAmount: number;
}

/**
 * Days between invoice and payment, bucketed
 */
export type MisalignmentBucket = '16-30' | '31-60' | '61-90' | '>90';

export interface MisapplicationMetrics {
    totalMisapplied: number;
    affectedAccounts: number;
    totalAppliedAmount: number;
    averageDaysMisaligned: number;
}

export interface AccountImpact {
    accountId: string;
    customerName: string | null;
    paymentCount: number;
    totalAppliedAmount: number;
}

export interface TimelinePoint {
    /** `YYYY-MM` of the payment */
    month: string;
    count: number;
}

export interface BucketCount {
    bucket: MisalignmentBucket;
    count: number;
}

export interface MisapplicationSummary {
    metrics: MisapplicationMetrics;
    topAccounts: AccountImpact[];
    timeline: TimelinePoint[];
    distribution: BucketCount[];
}
