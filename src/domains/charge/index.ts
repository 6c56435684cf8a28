/**
 * Charge Domain
 * =============
 *
 * Charge aggregation, payment, refund and settlement reporting.
 *
 * @module domains/charge
 *
 * @example
 * ```typescript
 * const { aggregator, payments } = getSettlementServices();
 * const charge = await aggregator.createCharge({ patientId, sources }, ctx);
 * await payments.processPayment({ chargeNo: charge.chargeNo, paymentMethod: 'CARD', transactionNo }, ctx);
 * ```
 */

export * from './services';
export { createChargeRepository, type ChargeRepository } from './repositories';
export { chargeStatusName } from './status';
export {
  CHARGE_STATUS,
  CHARGE_TYPES,
  CHARGE_ITEM_TYPES,
  PAYMENT_METHODS,
  type Charge,
  type ChargeDetail,
  type ChargeItemType,
  type ChargeQuery,
  type ChargeSource,
  type ChargeStatus,
  type ChargeStatusName,
  type ChargeType,
  type ChargesByType,
  type CancelChargeInput,
  type CreateChargeInput,
  type DailySettlement,
  type PaymentMethod,
  type ProcessPaymentInput,
  type ProcessRefundInput,
  type SettlementStatistics,
} from './types';
