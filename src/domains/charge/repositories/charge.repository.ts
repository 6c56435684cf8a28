/**
 * Charge Repository
 * =================
 *
 * Data access for charges and their detail lines. Every status change is a
 * conditional UPDATE on the expected prior status; the returned boolean tells
 * the caller whether it won. Store triggers reject any other transition.
 *
 * @module domains/charge/repositories
 */

import type { SettlementDatabase } from '@/lib/db';
import type { PaginatedResult } from '../../shared/types';
import {
  CHARGE_ITEM_TYPES,
  CHARGE_STATUS,
  CHARGE_TYPES,
  PAYMENT_METHODS,
  type Charge,
  type ChargeDetail,
  type ChargeItemType,
  type ChargeQuery,
  type ChargeStatus,
  type NewCharge,
  type PaymentMethod,
} from '../types';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 200;

// ============================================================================
// Row Types
// ============================================================================

interface ChargeRow {
  id: number;
  charge_no: string;
  patient_id: number;
  charge_type: string;
  total_amount: number;
  discount_amount: number;
  insurance_amount: number;
  actual_amount: number;
  status: number;
  payment_method: string | null;
  transaction_no: string | null;
  paid_at: string | null;
  refund_reason: string | null;
  refund_amount: number | null;
  refunded_at: string | null;
  cancel_reason: string | null;
  cancelled_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ChargeDetailRow {
  line_no: number;
  item_type: string;
  item_ref: number;
  item_name: string;
  item_amount: number;
}

export interface StatusCountRow {
  status: number;
  count: number;
}

export interface CollectionRow {
  status: number;
  payment_method: string | null;
  count: number;
  amount: number;
}

export interface RefundTotalsRow {
  count: number;
  amount: number;
}

// ============================================================================
// Mapping
// ============================================================================

function pick<T extends string | number>(values: readonly T[], raw: unknown, label: string): T {
  const value = values.find((candidate) => candidate === raw);
  if (value === undefined) {
    throw new Error(`Unknown ${label}: ${String(raw)}`);
  }
  return value;
}

const STATUS_VALUES: readonly ChargeStatus[] = Object.values(CHARGE_STATUS);

export function toChargeStatus(raw: number): ChargeStatus {
  return pick(STATUS_VALUES, raw, 'charge status');
}

export function toPaymentMethod(raw: string): PaymentMethod {
  return pick(PAYMENT_METHODS, raw, 'payment method');
}

function toDetail(row: ChargeDetailRow): ChargeDetail {
  return {
    lineNo: row.line_no,
    itemType: pick(CHARGE_ITEM_TYPES, row.item_type, 'charge item type'),
    itemRef: row.item_ref,
    itemName: row.item_name,
    itemAmount: row.item_amount,
  };
}

// ============================================================================
// Repository
// ============================================================================

export function createChargeRepository(db: SettlementDatabase) {
  const findByChargeNoStmt = db.prepare<[string], ChargeRow>(
    'SELECT * FROM charges WHERE charge_no = ?'
  );
  const findByTransactionNoStmt = db.prepare<[string], ChargeRow>(
    'SELECT * FROM charges WHERE transaction_no = ?'
  );
  const findDetailsStmt = db.prepare<[number], ChargeDetailRow>(
    'SELECT line_no, item_type, item_ref, item_name, item_amount FROM charge_details WHERE charge_id = ? ORDER BY line_no'
  );
  const findActiveForSourceStmt = db.prepare<[ChargeItemType, number], { charge_no: string }>(`
    SELECT c.charge_no FROM charge_details d
    JOIN charges c ON c.id = d.charge_id
    WHERE d.item_type = ? AND d.item_ref = ? AND c.status <> ${CHARGE_STATUS.CANCELLED}
    ORDER BY c.id
    LIMIT 1
  `);
  const findPaidForRegistrationStmt = db.prepare<[number], { charge_no: string }>(`
    SELECT c.charge_no FROM charge_details d
    JOIN charges c ON c.id = d.charge_id
    WHERE d.item_type = 'REGISTRATION' AND d.item_ref = ? AND c.status = ${CHARGE_STATUS.PAID}
    LIMIT 1
  `);
  const findByRegistrationStmt = db.prepare<[number, number], ChargeRow>(`
    SELECT DISTINCT c.* FROM charges c
    JOIN charge_details d ON d.charge_id = c.id
    LEFT JOIN prescriptions p ON d.item_type = 'PRESCRIPTION' AND p.id = d.item_ref
    WHERE (d.item_type = 'REGISTRATION' AND d.item_ref = ?) OR p.registration_id = ?
    ORDER BY c.id
  `);
  const insertStmt = db.prepare<
    [string, number, string, number, number, number, number, number, string, string],
    ChargeRow
  >(`
    INSERT INTO charges (
      charge_no, patient_id, charge_type, total_amount, discount_amount,
      insurance_amount, actual_amount, status, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    RETURNING *
  `);
  const insertDetailStmt = db.prepare<[number, number, string, number, string, number]>(`
    INSERT INTO charge_details (charge_id, line_no, item_type, item_ref, item_name, item_amount)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const markPaidStmt = db.prepare<[string, string, string, string, string]>(`
    UPDATE charges
    SET status = ${CHARGE_STATUS.PAID}, payment_method = ?, transaction_no = ?, paid_at = ?, updated_at = ?
    WHERE charge_no = ? AND status = ${CHARGE_STATUS.PENDING}
  `);
  const markRefundedStmt = db.prepare<[string, number, string, string, string]>(`
    UPDATE charges
    SET status = ${CHARGE_STATUS.REFUNDED}, refund_reason = ?, refund_amount = ?, refunded_at = ?, updated_at = ?
    WHERE charge_no = ? AND status = ${CHARGE_STATUS.PAID}
  `);
  const markCancelledStmt = db.prepare<[string, string, string, string]>(`
    UPDATE charges
    SET status = ${CHARGE_STATUS.CANCELLED}, cancel_reason = ?, cancelled_at = ?, updated_at = ?
    WHERE charge_no = ? AND status = ${CHARGE_STATUS.PENDING}
  `);
  const countByStatusStmt = db.prepare<[string, string], StatusCountRow>(`
    SELECT status, COUNT(*) AS count FROM charges
    WHERE created_at >= ? AND created_at < ?
    GROUP BY status
  `);
  const collectionsStmt = db.prepare<[string, string], CollectionRow>(`
    SELECT status, payment_method, COUNT(*) AS count, SUM(actual_amount) AS amount FROM charges
    WHERE paid_at >= ? AND paid_at < ?
      AND status IN (${CHARGE_STATUS.PAID}, ${CHARGE_STATUS.REFUNDED})
    GROUP BY status, payment_method
  `);
  const refundTotalsStmt = db.prepare<[string, string], RefundTotalsRow>(`
    SELECT COUNT(*) AS count, COALESCE(SUM(refund_amount), 0) AS amount FROM charges
    WHERE status = ${CHARGE_STATUS.REFUNDED} AND refunded_at >= ? AND refunded_at < ?
  `);

  function toCharge(row: ChargeRow): Charge {
    return {
      id: row.id,
      chargeNo: row.charge_no,
      patientId: row.patient_id,
      chargeType: pick(CHARGE_TYPES, row.charge_type, 'charge type'),
      totalAmount: row.total_amount,
      discountAmount: row.discount_amount,
      insuranceAmount: row.insurance_amount,
      actualAmount: row.actual_amount,
      status: toChargeStatus(row.status),
      paymentMethod: row.payment_method === null ? null : toPaymentMethod(row.payment_method),
      transactionNo: row.transaction_no,
      paidAt: row.paid_at,
      refundReason: row.refund_reason,
      refundAmount: row.refund_amount,
      refundedAt: row.refunded_at,
      cancelReason: row.cancel_reason,
      cancelledAt: row.cancelled_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      details: findDetailsStmt.all(row.id).map(toDetail),
    };
  }

  return {
    findByChargeNo(chargeNo: string): Charge | null {
      const row = findByChargeNoStmt.get(chargeNo);
      return row ? toCharge(row) : null;
    },

    findByTransactionNo(transactionNo: string): Charge | null {
      const row = findByTransactionNoStmt.get(transactionNo);
      return row ? toCharge(row) : null;
    },

    /**
     * Charge number of the non-cancelled charge that already bills this source
     */
    findActiveChargeNoForSource(itemType: ChargeItemType, itemRef: number): string | null {
      return findActiveForSourceStmt.get(itemType, itemRef)?.charge_no ?? null;
    },

    hasPaidRegistrationCharge(registrationId: number): boolean {
      return findPaidForRegistrationStmt.get(registrationId) !== undefined;
    },

    findByRegistration(registrationId: number): Charge[] {
      return findByRegistrationStmt.all(registrationId, registrationId).map(toCharge);
    },

    /**
     * Insert header and details. Must run inside the caller's transaction.
     */
    insert(charge: NewCharge, now: string): Charge {
      const row = insertStmt.get(
        charge.chargeNo,
        charge.patientId,
        charge.chargeType,
        charge.totalAmount,
        charge.discountAmount,
        charge.insuranceAmount,
        charge.actualAmount,
        CHARGE_STATUS.PENDING,
        now,
        now
      );
      if (!row) {
        throw new Error('Charge insert returned no row');
      }

      for (const detail of charge.details) {
        insertDetailStmt.run(
          row.id,
          detail.lineNo,
          detail.itemType,
          detail.itemRef,
          detail.itemName,
          detail.itemAmount
        );
      }

      return toCharge(row);
    },

    markPaid(
      chargeNo: string,
      paymentMethod: PaymentMethod,
      transactionNo: string,
      paidAt: string
    ): boolean {
      return markPaidStmt.run(paymentMethod, transactionNo, paidAt, paidAt, chargeNo).changes === 1;
    },

    markRefunded(chargeNo: string, reason: string, refundAmount: number, refundedAt: string): boolean {
      return (
        markRefundedStmt.run(reason, refundAmount, refundedAt, refundedAt, chargeNo).changes === 1
      );
    },

    markCancelled(chargeNo: string, reason: string, cancelledAt: string): boolean {
      return markCancelledStmt.run(reason, cancelledAt, cancelledAt, chargeNo).changes === 1;
    },

    query(filter: ChargeQuery): PaginatedResult<Charge> {
      const limit = Math.min(Math.max(1, filter.limit ?? DEFAULT_LIMIT), MAX_LIMIT);
      const offset = Math.max(0, filter.offset ?? 0);

      const clauses: string[] = [];
      const params: Array<string | number> = [];
      if (filter.chargeNo) {
        clauses.push('charge_no = ?');
        params.push(filter.chargeNo);
      }
      if (filter.patientId !== undefined) {
        clauses.push('patient_id = ?');
        params.push(filter.patientId);
      }
      if (filter.status !== undefined) {
        clauses.push('status = ?');
        params.push(filter.status);
      }
      if (filter.startDate) {
        clauses.push('created_at >= ?');
        params.push(filter.startDate);
      }
      if (filter.endDate) {
        clauses.push('created_at < ?');
        params.push(filter.endDate);
      }
      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

      const totalRow = db
        .prepare<Array<string | number>, { total: number }>(
          `SELECT COUNT(*) AS total FROM charges ${where}`
        )
        .get(...params);
      const rows = db
        .prepare<Array<string | number>, ChargeRow>(
          `SELECT * FROM charges ${where} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`
        )
        .all(...params, limit, offset);

      const total = totalRow?.total ?? 0;
      return {
        data: rows.map(toCharge),
        total,
        hasMore: offset + rows.length < total,
        limit,
        offset,
      };
    },

    countByStatusCreatedBetween(from: string, to: string): StatusCountRow[] {
      return countByStatusStmt.all(from, to);
    },

    collectionsBetween(from: string, to: string): CollectionRow[] {
      return collectionsStmt.all(from, to);
    },

    refundTotalsBetween(from: string, to: string): RefundTotalsRow {
      return refundTotalsStmt.get(from, to) ?? { count: 0, amount: 0 };
    },
  };
}

export type ChargeRepository = ReturnType<typeof createChargeRepository>;
