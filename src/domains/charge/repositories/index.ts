export {
  createChargeRepository,
  toChargeStatus,
  toPaymentMethod,
  type ChargeRepository,
  type CollectionRow,
  type RefundTotalsRow,
  type StatusCountRow,
} from './charge.repository';
