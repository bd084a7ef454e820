/**
 * legacy-finance-reports - Report SQL
 *
 * Static MySQL statements behind every repository report. Parameters use
 * mysql2 named placeholders (`:customer_id`).
 */

import type { EntityId, QueryParams } from "../types/database.js";

export interface Statement {
  sql: string;
  params: QueryParams;
}

// =============================================================================
// Row limits
// =============================================================================

export const MISAPPLIED_CUSTOMERS_LIMIT = 100;
export const CUSTOMER_PAYMENTS_LIMIT = 100;
export const AFFECTED_ENROLLMENTS_LIMIT = 100;
export const CUSTOMER_ENROLLMENTS_LIMIT = 100;
export const DEFAULT_PAYMENT_DATA_LIMIT = 1000;
export const MAX_PAYMENT_DATA_LIMIT = 10000;
export const PAYMENT_CYCLE_LIMIT = 5000;
export const MISAPPLIED_PAYMENTS_LIMIT = 5000;
export const CUSTOMER_DATASET_LIMIT = 1000;

/** Lesson status value for a cancelled lesson */
export const LESSON_STATUS_CANCELLED = 2;

// =============================================================================
// Legacy lesson/enrolment schema
// =============================================================================

/**
 * Customers with payments applied to a lesson later than the payment while
 * an older unpaid lesson (more than 14 days before, already due) exists.
 */
export const CUSTOMERS_WITH_MISAPPLIED_PAYMENTS_SQL = `
  SELECT DISTINCT
    p.user_id,
    up.firstname,
    up.lastname,
    COUNT(DISTINCT p.id) AS num_suspicious_payments
  FROM
    payment p
    JOIN lesson_payment lp ON p.id = lp.paymentId
    JOIN lesson l_paid ON lp.lessonId = l_paid.id
    JOIN enrolment e ON l_paid.courseId = e.courseId
    JOIN student s ON e.studentId = s.id
    JOIN user_profile up ON p.user_id = up.user_id
  WHERE
    s.customer_id = p.user_id
    AND EXISTS (
      SELECT 1
      FROM lesson l_unpaid
      JOIN enrolment e_unpaid ON l_unpaid.courseId = e_unpaid.courseId
      JOIN student s_unpaid ON e_unpaid.studentId = s_unpaid.id
      WHERE
        s_unpaid.customer_id = p.user_id
        AND l_unpaid.paidStatus = 0
        AND l_unpaid.date < l_paid.date
        AND l_unpaid.dueDate <= l_paid.date
        AND DATEDIFF(l_paid.date, l_unpaid.date) > 14
        AND l_paid.date > p.date
    )
  GROUP BY
    p.user_id,
    up.firstname,
    up.lastname
  ORDER BY
    num_suspicious_payments DESC
  LIMIT ${String(MISAPPLIED_CUSTOMERS_LIMIT)}
`;

/** Most frequent payment frequency across the customer's enrolments */
export const CUSTOMER_DETAILS_SQL = `
  SELECT
    u.id AS user_id,
    CONCAT(up.firstname, ' ', up.lastname) AS customer_name,
    ue.email,
    ca.balance,
    (
      SELECT pf.name
      FROM enrolment e
      JOIN payment_frequency pf ON e.paymentFrequencyId = pf.id
      JOIN student s ON e.studentId = s.id
      WHERE s.customer_id = u.id
      GROUP BY pf.name
      ORDER BY COUNT(*) DESC
      LIMIT 1
    ) AS payment_frequency
  FROM
    user u
    JOIN user_profile up ON u.id = up.user_id
    LEFT JOIN user_email ue ON u.id = ue.user_id
    LEFT JOIN customer_account ca ON u.id = ca.user_id
  WHERE
    u.id = :customer_id
  LIMIT 1
`;

export const CUSTOMER_PAYMENTS_SQL = `
  SELECT
    p.id AS payment_id,
    p.date AS payment_date,
    p.amount,
    p.balance,
    p.status,
    pm.name AS payment_method
  FROM
    payment p
    LEFT JOIN payment_method pm ON p.payment_method_id = pm.id
  WHERE
    p.user_id = :customer_id
  ORDER BY
    p.date DESC
  LIMIT ${String(CUSTOMER_PAYMENTS_LIMIT)}
`;

export const PAYMENT_DETAILS_SQL = `
  SELECT
    p.id AS payment_id,
    p.user_id,
    p.date AS payment_date,
    p.amount,
    p.balance,
    p.status,
    pm.name AS payment_method,
    CONCAT(up.firstname, ' ', up.lastname) AS customer_name
  FROM
    payment p
    LEFT JOIN payment_method pm ON p.payment_method_id = pm.id
    LEFT JOIN user_profile up ON p.user_id = up.user_id
  WHERE
    p.id = :payment_id
  LIMIT 1
`;

export const RELATED_ENROLMENT_DETAILS_SQL = `
  SELECT
    e.id AS enrolment_id,
    e.paymentFrequencyId,
    pf.name AS payment_frequency,
    e.startDateTime,
    e.endDateTime,
    e.isAutoRenew,
    s.first_name AS student_first_name,
    s.last_name AS student_last_name,
    s.id AS student_id,
    c.name AS course_name
  FROM
    lesson_payment lp
    JOIN lesson l ON lp.lessonId = l.id
    JOIN enrolment e ON lp.enrolmentId = e.id
    JOIN student s ON e.studentId = s.id
    JOIN course c ON e.courseId = c.id
    JOIN payment_frequency pf ON e.paymentFrequencyId = pf.id
  WHERE
    lp.paymentId = :payment_id
  GROUP BY
    e.id
  LIMIT 1
`;

export const CURRENT_PAYMENT_APPLICATIONS_SQL = `
  SELECT
    l.id AS lesson_id,
    l.date AS lesson_date,
    l.dueDate AS lesson_due_date,
    l.total AS lesson_amount,
    lp.amount AS applied_amount,
    e.id AS enrolment_id,
    s.first_name AS student_first_name,
    s.last_name AS student_last_name,
    s.id AS student_id,
    p.date AS payment_date,
    CASE WHEN l.date > p.date THEN 1 ELSE 0 END AS is_future_lesson
  FROM
    lesson_payment lp
    JOIN lesson l ON lp.lessonId = l.id
    JOIN enrolment e ON lp.enrolmentId = e.id
    JOIN student s ON e.studentId = s.id
    JOIN payment p ON lp.paymentId = p.id
  WHERE
    lp.paymentId = :payment_id
  ORDER BY
    l.date
`;

/**
 * Enrolments that ended without auto-renew while non-cancelled lessons of the
 * course are still scheduled after the window end.
 */
export const AFFECTED_ENROLLMENTS_SQL = `
  SELECT
    e.id AS enrolment_id,
    s.first_name,
    s.last_name,
    s.customer_id,
    e.endDateTime,
    e.isAutoRenew,
    c.name AS course_name
  FROM
    enrolment e
    JOIN student s ON e.studentId = s.id
    JOIN course c ON e.courseId = c.id
  WHERE
    e.endDateTime <= :end_date
    AND e.isAutoRenew = 0
    AND EXISTS (
      SELECT 1
      FROM lesson l
      WHERE
        l.courseId = e.courseId
        AND l.date > :end_date
        AND l.status != ${String(LESSON_STATUS_CANCELLED)}
    )
  ORDER BY
    e.endDateTime
  LIMIT ${String(AFFECTED_ENROLLMENTS_LIMIT)}
`;

export const CUSTOMER_ENROLLMENTS_SQL = `
  SELECT
    e.id AS enrolment_id,
    CONCAT(s.first_name, ' ', s.last_name) AS student_name,
    c.name AS course_name,
    pf.name AS payment_frequency,
    e.startDateTime,
    e.endDateTime,
    e.isAutoRenew
  FROM
    enrolment e
    JOIN student s ON e.studentId = s.id
    JOIN course c ON e.courseId = c.id
    JOIN payment_frequency pf ON e.paymentFrequencyId = pf.id
  WHERE
    s.customer_id = :customer_id
  ORDER BY
    e.startDateTime DESC
  LIMIT ${String(CUSTOMER_ENROLLMENTS_LIMIT)}
`;

// =============================================================================
// Account/invoice schema
// =============================================================================

const PAYMENT_DATA_BASE_SQL = `
  SELECT
    p.id AS payment_id,
    p.amount,
    p.created_at AS payment_date,
    p.status,
    p.payment_method,
    a.id AS account_id,
    CONCAT(c.first_name, ' ', c.last_name) AS customer_name,
    i.id AS invoice_id,
    i.amount AS invoice_amount,
    i.created_at AS invoice_date,
    l.id AS lesson_id,
    l.date AS lesson_date,
    l.status AS lesson_status,
    e.id AS enrollment_id,
    c.id AS customer_id
  FROM
    payment p
    LEFT JOIN account a ON p.account_id = a.id
    LEFT JOIN customer c ON a.customer_id = c.id
    LEFT JOIN payment_invoice pi ON p.id = pi.payment_id
    LEFT JOIN invoice i ON pi.invoice_id = i.id
    LEFT JOIN invoice_lesson il ON i.id = il.invoice_id
    LEFT JOIN lesson l ON il.lesson_id = l.id
    LEFT JOIN enrollment e ON l.enrollment_id = e.id
  WHERE
    p.deleted_at IS NULL`;

export const PAYMENT_CYCLE_DATA_SQL = `
  SELECT
    p.id AS payment_id,
    p.amount,
    p.created_at AS payment_date,
    YEAR(p.created_at) * 100 + MONTH(p.created_at) AS payment_yearmonth,
    a.id AS account_id,
    i.id AS invoice_id,
    i.created_at AS invoice_date,
    YEAR(i.created_at) * 100 + MONTH(i.created_at) AS invoice_yearmonth,
    DATEDIFF(i.created_at, p.created_at) AS days_difference,
    pi.amount AS applied_amount,
    e.billing_cycle_day
  FROM
    payment p
    JOIN account a ON p.account_id = a.id
    JOIN payment_invoice pi ON p.id = pi.payment_id
    JOIN invoice i ON pi.invoice_id = i.id
    LEFT JOIN invoice_lesson il ON i.id = il.invoice_id
    LEFT JOIN lesson l ON il.lesson_id = l.id
    LEFT JOIN enrollment e ON l.enrollment_id = e.id
  WHERE
    p.deleted_at IS NULL
    AND i.deleted_at IS NULL
  ORDER BY
    p.created_at DESC
  LIMIT ${String(PAYMENT_CYCLE_LIMIT)}
`;

/** Payments created more than 15 days after the invoice they settle */
export const MISAPPLIED_PAYMENTS_SQL = `
  SELECT
    p.id AS payment_id,
    p.amount AS payment_amount,
    p.created_at AS payment_date,
    YEAR(p.created_at) * 100 + MONTH(p.created_at) AS payment_yearmonth,
    a.id AS account_id,
    CONCAT(c.first_name, ' ', c.last_name) AS customer_name,
    i.id AS invoice_id,
    i.created_at AS invoice_date,
    YEAR(i.created_at) * 100 + MONTH(i.created_at) AS invoice_yearmonth,
    pi.amount AS applied_amount,
    DATEDIFF(p.created_at, i.created_at) AS days_difference,
    e.billing_cycle_day
  FROM
    payment p
    JOIN account a ON p.account_id = a.id
    JOIN customer c ON a.customer_id = c.id
    JOIN payment_invoice pi ON p.id = pi.payment_id
    JOIN invoice i ON pi.invoice_id = i.id
    LEFT JOIN invoice_lesson il ON i.id = il.invoice_id
    LEFT JOIN lesson l ON il.lesson_id = l.id
    LEFT JOIN enrollment e ON l.enrollment_id = e.id
  WHERE
    p.deleted_at IS NULL
    AND i.deleted_at IS NULL
    AND p.created_at > i.created_at
    AND DATEDIFF(p.created_at, i.created_at) > 15
  ORDER BY
    days_difference DESC
  LIMIT ${String(MISAPPLIED_PAYMENTS_LIMIT)}
`;

const ENROLMENT_DATA_BASE_SQL = `
  SELECT
    e.id AS enrolment_id,
    e.created_at AS enrolment_date,
    p.id AS program_id,
    p.name AS program_name,
    c.id AS customer_id,
    CONCAT(c.first_name, ' ', c.last_name) AS customer_name
  FROM
    enrollment e
    JOIN program p ON e.program_id = p.id
    JOIN customer c ON e.customer_id = c.id
  WHERE
    e.deleted_at IS NULL`;

const LESSON_DATA_BASE_SQL = `
  SELECT
    l.id AS lesson_id,
    l.date AS lesson_date,
    l.status AS lesson_status,
    CASE
      WHEN l.group_id IS NULL THEN 'Private'
      ELSE 'Group'
    END AS lesson_type,
    e.id AS enrolment_id,
    c.id AS customer_id,
    CONCAT(c.first_name, ' ', c.last_name) AS customer_name
  FROM
    lesson l
    JOIN enrollment e ON l.enrollment_id = e.id
    JOIN customer c ON e.customer_id = c.id
  WHERE
    l.deleted_at IS NULL`;

const INVOICE_DATA_BASE_SQL = `
  SELECT
    i.id AS invoice_id,
    i.created_at AS invoice_date,
    i.amount,
    i.status,
    a.id AS account_id,
    c.id AS customer_id,
    CONCAT(c.first_name, ' ', c.last_name) AS customer_name,
    il.lesson_id
  FROM
    invoice i
    JOIN account a ON i.account_id = a.id
    JOIN customer c ON a.customer_id = c.id
    LEFT JOIN invoice_lesson il ON i.id = il.invoice_id
  WHERE
    i.deleted_at IS NULL`;

/**
 * Append the optional customer filter, then the ordering tail
 */
function withCustomerFilter(
  base: string,
  tail: string,
  customerId: EntityId | undefined,
  params: QueryParams = {},
): Statement {
  if (customerId === undefined) {
    return { sql: `${base}\n  ${tail}`, params };
  }
  return {
    sql: `${base}\n    AND c.id = :customer_id\n  ${tail}`,
    params: { ...params, customer_id: customerId },
  };
}

export function buildPaymentDataQuery(
  limit: number,
  customerId?: EntityId,
): Statement {
  return withCustomerFilter(
    PAYMENT_DATA_BASE_SQL,
    "ORDER BY p.created_at DESC LIMIT :limit",
    customerId,
    { limit },
  );
}

export function buildEnrolmentDataQuery(customerId?: EntityId): Statement {
  return withCustomerFilter(
    ENROLMENT_DATA_BASE_SQL,
    `ORDER BY e.created_at DESC LIMIT ${String(CUSTOMER_DATASET_LIMIT)}`,
    customerId,
  );
}

export function buildLessonDataQuery(customerId?: EntityId): Statement {
  return withCustomerFilter(
    LESSON_DATA_BASE_SQL,
    `ORDER BY l.date DESC LIMIT ${String(CUSTOMER_DATASET_LIMIT)}`,
    customerId,
  );
}

export function buildInvoiceDataQuery(customerId?: EntityId): Statement {
  return withCustomerFilter(
    INVOICE_DATA_BASE_SQL,
    `ORDER BY i.created_at DESC LIMIT ${String(CUSTOMER_DATASET_LIMIT)}`,
    customerId,
  );
}
