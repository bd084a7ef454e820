/**
 * legacy-finance-reports - Report Catalog
 *
 * Named, argument-checked entry points over the repository and the
 * financial reports service, used by the CLI.
 */

import { z } from 'zod';
import { DateInputSchema, EntityIdSchema, LimitSchema } from '../repositories/LegacyRepository.js';
import type { LegacyRepository } from '../repositories/LegacyRepository.js';
import { FinancialReportsService } from '../services/FinancialReportsService.js';
import type { Row } from '../types/database.js';
import { ValidationError } from '../types/errors.js';
import type { Customer360, MisapplicationSummary, PaymentStatistics } from '../types/reports.js';

export type ReportResult =
    | Row[]
    | Row
    | null
    | Customer360
    | PaymentStatistics
    | MisapplicationSummary;

export interface ReportArgument {
    name: string;
    required: boolean;
}

export interface ReportDefinition {
    name: string;
    description: string;
    arguments: ReportArgument[];
    /** Validate raw arguments, then run */
    execute: (repository: LegacyRepository, rawArgs: Record<string, unknown>) => Promise<ReportResult>;
}

const NoArgs = z.object({});
const CustomerArgs = z.object({ customerId: EntityIdSchema });
const OptionalCustomerArgs = z.object({ customerId: EntityIdSchema.optional() });
const PaymentArgs = z.object({ paymentId: EntityIdSchema });
const DateWindowArgs = z.object({ startDate: DateInputSchema, endDate: DateInputSchema });
const PaymentDataArgs = z.object({
    customerId: EntityIdSchema.optional(),
    limit: LimitSchema.optional()
});

function defineReport<S extends z.AnyZodObject>(definition: {
    name: string;
    description: string;
    args: S;
    run: (repository: LegacyRepository, args: z.output<S>) => Promise<ReportResult>;
}): ReportDefinition {
    const { name, description, args, run } = definition;
    return {
        name,
        description,
        arguments: Object.entries<z.ZodTypeAny>(args.shape).map(([argName, schema]) => ({
            name: argName,
            required: !schema.isOptional()
        })),
        execute: async (repository, rawArgs) => {
            const parsed = args.safeParse(rawArgs);
            if (!parsed.success) {
                const reason = parsed.error.issues
                    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                    .join('; ');
                throw new ValidationError(`Invalid arguments for report '${name}': ${reason}`, {
                    report: name
                });
            }
            return run(repository, parsed.data);
        }
    };
}

export const REPORTS: readonly ReportDefinition[] = [
    defineReport({
        name: 'misapplied-customers',
        description: 'Customers with payments applied ahead of older unpaid lessons',
        args: NoArgs,
        run: (repo) => repo.getCustomersWithMisappliedPayments()
    }),
    defineReport({
        name: 'customer-details',
        description: 'Name, email, balance and usual payment frequency of a customer',
        args: CustomerArgs,
        run: (repo, args) => repo.getCustomerDetails(args.customerId)
    }),
    defineReport({
        name: 'customer-payments',
        description: 'Latest payments of a customer',
        args: CustomerArgs,
        run: (repo, args) => repo.getCustomerPayments(args.customerId)
    }),
    defineReport({
        name: 'customer-enrollments',
        description: 'Enrolments of a customer, newest first',
        args: CustomerArgs,
        run: (repo, args) => repo.getCustomerEnrollments(args.customerId)
    }),
    defineReport({
        name: 'payment-details',
        description: 'One payment with its method and customer',
        args: PaymentArgs,
        run: (repo, args) => repo.getPaymentDetails(args.paymentId)
    }),
    defineReport({
        name: 'payment-enrolment',
        description: 'Enrolment a payment was applied to',
        args: PaymentArgs,
        run: (repo, args) => repo.getRelatedEnrolmentDetails(args.paymentId)
    }),
    defineReport({
        name: 'payment-applications',
        description: 'Lessons a payment is currently applied to',
        args: PaymentArgs,
        run: (repo, args) => repo.getCurrentPaymentApplications(args.paymentId)
    }),
    defineReport({
        name: 'affected-enrollments',
        description: 'Ended, non-renewing enrolments that still have lessons scheduled',
        args: DateWindowArgs,
        run: (repo, args) => repo.getAffectedEnrollments(args.startDate, args.endDate)
    }),
    defineReport({
        name: 'payment-data',
        description: 'Payments joined to invoices, lessons and enrolments',
        args: PaymentDataArgs,
        run: (repo, args) =>
            repo.fetchPaymentData({ limit: args.limit, customerId: args.customerId })
    }),
    defineReport({
        name: 'payment-cycles',
        description: 'Payment and invoice months side by side',
        args: NoArgs,
        run: (repo) => repo.fetchPaymentCycleData()
    }),
    defineReport({
        name: 'misapplied-payments',
        description: 'Payments created more than 15 days after their invoice',
        args: NoArgs,
        run: (repo) => repo.fetchMisappliedPayments()
    }),
    defineReport({
        name: 'enrolments',
        description: 'Enrolments with program and customer',
        args: OptionalCustomerArgs,
        run: (repo, args) => repo.fetchEnrolmentData(args.customerId)
    }),
    defineReport({
        name: 'lessons',
        description: 'Lessons with private/group type and customer',
        args: OptionalCustomerArgs,
        run: (repo, args) => repo.fetchLessonData(args.customerId)
    }),
    defineReport({
        name: 'invoices',
        description: 'Invoices with account, customer and lesson',
        args: OptionalCustomerArgs,
        run: (repo, args) => repo.fetchInvoiceData(args.customerId)
    }),
    defineReport({
        name: 'customer-360',
        description: 'Enrolments, lessons, invoices and payments of one customer',
        args: CustomerArgs,
        run: (repo, args) => new FinancialReportsService(repo).getCustomer360(args.customerId)
    }),
    defineReport({
        name: 'customer-payment-stats',
        description: 'Payment count, total and average for one customer',
        args: CustomerArgs,
        run: (repo, args) =>
            new FinancialReportsService(repo).getCustomerPaymentStatistics(args.customerId)
    }),
    defineReport({
        name: 'misapplication-summary',
        description: 'Metrics, top accounts, timeline and day buckets of misapplied payments',
        args: NoArgs,
        run: (repo) => new FinancialReportsService(repo).getMisapplicationSummary()
    })
];

export function findReport(name: string): ReportDefinition | undefined {
    return REPORTS.find((report) => report.name === name);
}

/**
 * Run a named report
 *
 * Undefined arguments are dropped; arguments a report does not take are ignored.
 *
 * @throws ValidationError for an unknown report or a missing or malformed argument
 */
export async function runReport(
    name: string,
    repository: LegacyRepository,
    rawArgs: Record<string, unknown> = {}
): Promise<ReportResult> {
    const report = findReport(name);
    if (report === undefined) {
        throw new ValidationError(`Unknown report '${name}'`, {
            available: REPORTS.map((r) => r.name)
        });
    }

    const defined = Object.fromEntries(
        Object.entries(rawArgs).filter(([, value]) => value !== undefined)
    );
    return report.execute(repository, defined);
}
