/**
 * Mock Payment Provider
 * =====================
 *
 * Stand-in for a card / mobile-wallet gateway. Approves every payment,
 * issues a `MOCK-` transaction reference and delivers the callback to the
 * payment processor. `replayCallback` re-delivers a previous callback
 * verbatim, the way real gateways retry notifications.
 *
 * @module domains/charge/services/mock-payment-provider
 */

import { logger } from '@/lib/logger';
import { NotFoundError } from '../../shared/errors';
import { systemClock, type Clock, type SettlementContext } from '../../shared/types';
import type { Charge, PaymentMethod, ProcessPaymentInput } from '../types';
import type { PaymentProcessor } from './payment-processor';

export interface MockPaymentResult {
  transactionNo: string;
  charge: Charge;
}

export class MockPaymentProvider {
  private callbacks = new Map<string, ProcessPaymentInput>();
  private issued = 0;

  constructor(
    private readonly processor: PaymentProcessor,
    private readonly clock: Clock = systemClock
  ) {}

  async pay(
    chargeNo: string,
    amount: number,
    paymentMethod: PaymentMethod,
    ctx: SettlementContext
  ): Promise<MockPaymentResult> {
    this.issued += 1;
    const transactionNo = `MOCK-${this.clock().getTime()}-${String(this.issued).padStart(4, '0')}`;
    const callback: ProcessPaymentInput = { chargeNo, paymentMethod, transactionNo, paidAmount: amount };
    this.callbacks.set(transactionNo, callback);

    logger.debug('[MockPaymentProvider] Approved', { chargeNo, transactionNo, amount });
    const charge = await this.processor.processPayment(callback, ctx);
    return { transactionNo, charge };
  }

  async replayCallback(transactionNo: string, ctx: SettlementContext): Promise<Charge> {
    const callback = this.callbacks.get(transactionNo);
    if (!callback) {
      throw new NotFoundError('Payment callback', transactionNo);
    }
    return this.processor.processPayment({ ...callback }, ctx);
  }
}
