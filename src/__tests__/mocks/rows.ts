/**
 * legacy-finance-reports - Row Fixtures
 *
 * Factories for report rows as the repository returns them.
 */

import type { Row } from "../../types/database.js";

/**
 * Row of fetchPaymentData / getCustomerPayments
 */
export function createMockPaymentRow(overrides: Row = {}): Row {
  return {
    payment_id: 1,
    amount: "100.00",
    payment_date: new Date("2024-03-05T10:00:00Z"),
    status: 1,
    customer_id: 7,
    customer_name: "Test Customer",
    ...overrides,
  };
}

/**
 * Row of fetchMisappliedPayments
 */
export function createMockMisappliedPaymentRow(overrides: Row = {}): Row {
  return {
    payment_id: 1,
    payment_amount: "50.00",
    payment_date: new Date("2024-03-20T00:00:00Z"),
    payment_yearmonth: 202403,
    account_id: 10,
    customer_name: "Test Customer",
    invoice_id: 100,
    invoice_date: new Date("2024-02-01T00:00:00Z"),
    invoice_yearmonth: 202402,
    applied_amount: "50.00",
    days_difference: 48,
    billing_cycle_day: 1,
    ...overrides,
  };
}

/**
 * information_schema.COLUMNS row as selected by the table reflector
 */
export function createMockColumnRow(overrides: Row = {}): Row {
  return {
    table_schema: "smw_legacy_full",
    name: "id",
    data_type: "INT",
    column_type: "int(11)",
    is_nullable: "NO",
    column_key: "PRI",
    column_default: null,
    extra: "auto_increment",
    column_comment: "",
    ...overrides,
  };
}
