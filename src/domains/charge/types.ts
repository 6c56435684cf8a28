/**
 * Charge Domain Types
 * ===================
 *
 * Amounts are integer cents. Timestamps are ISO-8601 UTC strings.
 *
 * @module domains/charge/types
 */

import type { PaginationOptions } from '../shared/types';

// ============================================================================
// Enumerations
// ============================================================================

export const CHARGE_STATUS = {
  PENDING: 0,
  PAID: 1,
  REFUNDED: 2,
  CANCELLED: 3,
} as const;

export type ChargeStatus = (typeof CHARGE_STATUS)[keyof typeof CHARGE_STATUS];

export type ChargeStatusName = keyof typeof CHARGE_STATUS;

export const CHARGE_TYPES = ['REGISTRATION_ONLY', 'PRESCRIPTION_ONLY', 'MIXED'] as const;

export type ChargeType = (typeof CHARGE_TYPES)[number];

export const CHARGE_ITEM_TYPES = ['REGISTRATION', 'PRESCRIPTION'] as const;

export type ChargeItemType = (typeof CHARGE_ITEM_TYPES)[number];

export const PAYMENT_METHODS = ['CASH', 'CARD', 'WECHAT', 'ALIPAY', 'INSURANCE'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

// ============================================================================
// Entities
// ============================================================================

export interface ChargeDetail {
  lineNo: number;
  itemType: ChargeItemType;
  /** Registration id or prescription id */
  itemRef: number;
  itemName: string;
  itemAmount: number;
}

export interface Charge {
  id: number;
  chargeNo: string;
  patientId: number;
  chargeType: ChargeType;
  totalAmount: number;
  discountAmount: number;
  insuranceAmount: number;
  actualAmount: number;
  status: ChargeStatus;
  paymentMethod: PaymentMethod | null;
  /** Idempotency key from the payment channel; null until paid */
  transactionNo: string | null;
  paidAt: string | null;
  refundReason: string | null;
  refundAmount: number | null;
  refundedAt: string | null;
  cancelReason: string | null;
  cancelledAt: string | null;
  createdAt: string;
  updatedAt: string;
  details: ChargeDetail[];
}

// ============================================================================
// Inputs
// ============================================================================

export interface ChargeSource {
  type: ChargeItemType;
  id: number;
}

export interface CreateChargeInput {
  patientId: number;
  sources: ChargeSource[];
  /** Total the client believes it is charging; must match the computed total */
  declaredTotal?: number;
  discountAmount?: number;
  insuranceAmount?: number;
}

export interface CancelChargeInput {
  chargeNo: string;
  reason: string;
}

export interface ProcessPaymentInput {
  chargeNo: string;
  paymentMethod: PaymentMethod;
  transactionNo: string;
  /** Amount the channel reports as collected; must equal actualAmount */
  paidAmount?: number;
}

export interface ProcessRefundInput {
  chargeNo: string;
  reason: string;
  restoreInventory: boolean;
  /** Defaults to actualAmount */
  refundAmount?: number;
}

export interface ChargeQuery extends PaginationOptions {
  chargeNo?: string;
  patientId?: number;
  status?: ChargeStatus;
  /** Inclusive lower bound on createdAt */
  startDate?: string;
  /** Exclusive upper bound on createdAt */
  endDate?: string;
}

/** Row-level values written when a charge is created */
export interface NewCharge {
  chargeNo: string;
  patientId: number;
  chargeType: ChargeType;
  totalAmount: number;
  discountAmount: number;
  insuranceAmount: number;
  actualAmount: number;
  details: ChargeDetail[];
}

// ============================================================================
// Reports
// ============================================================================

export interface MethodBreakdown {
  count: number;
  amount: number;
}

export interface SettlementStatistics {
  from: string;
  to: string;
  /** Charges created in the range, by current status */
  chargeCounts: Record<ChargeStatusName, number>;
  /** Σ actualAmount of charges paid in range and still PAID */
  paidAmount: number;
  /** Σ actualAmount of charges paid in range, PAID or REFUNDED */
  collectedAmount: number;
  refunds: { count: number; amount: number };
  /** collectedAmount − refunds.amount */
  netCollection: number;
  byPaymentMethod: Partial<Record<PaymentMethod, MethodBreakdown>>;
}

export interface DailySettlement extends SettlementStatistics {
  date: string;
}

export interface ChargesByType {
  registrationCharges: Charge[];
  prescriptionCharges: Charge[];
  mixedCharges: Charge[];
}
