export {
  createChargeAggregator,
  type ChargeAggregator,
  type ChargeAggregatorDeps,
} from './charge-aggregator';
export {
  createPaymentProcessor,
  type PaymentProcessor,
  type PaymentProcessorDeps,
} from './payment-processor';
export {
  createRefundProcessor,
  type RefundProcessor,
  type RefundProcessorDeps,
} from './refund-processor';
export {
  createSettlementReportEngine,
  type SettlementRange,
  type SettlementReportEngine,
} from './settlement-report';
export { MockPaymentProvider, type MockPaymentResult } from './mock-payment-provider';
