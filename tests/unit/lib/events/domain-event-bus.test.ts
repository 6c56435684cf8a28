import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  domainEvents,
  DOMAIN_EVENTS,
  InProcessEventBus,
  type DomainEvent,
} from '@/lib/events/domain-event-bus';

vi.mock('@/lib/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('domain-event-bus', () => {
  beforeEach(() => {
    domainEvents.unsubscribeAll();
  });

  describe('DOMAIN_EVENTS', () => {
    it('has expected event types', () => {
      expect(DOMAIN_EVENTS.CHARGE_CREATED).toBe('ChargeCreated');
      expect(DOMAIN_EVENTS.CHARGE_CANCELLED).toBe('ChargeCancelled');
      expect(DOMAIN_EVENTS.PAYMENT_RECEIVED).toBe('PaymentReceived');
      expect(DOMAIN_EVENTS.CHARGE_REFUNDED).toBe('ChargeRefunded');
      expect(DOMAIN_EVENTS.PRESCRIPTION_DISPENSED).toBe('PrescriptionDispensed');
    });
  });

  describe('subscribe and publish', () => {
    it('delivers event to handler', async () => {
      const handler = vi.fn<(event: DomainEvent) => Promise<void>>().mockResolvedValue(undefined);
      domainEvents.subscribe(DOMAIN_EVENTS.PAYMENT_RECEIVED, handler);

      await domainEvents.publish({
        type: DOMAIN_EVENTS.PAYMENT_RECEIVED,
        payload: { chargeNo: 'CHG20260103000001', actualAmount: 10000 },
        metadata: { correlationId: 'req-1', operatorId: 7 },
      });

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(
        expect.objectContaining({
          type: DOMAIN_EVENTS.PAYMENT_RECEIVED,
          payload: { chargeNo: 'CHG20260103000001', actualAmount: 10000 },
          metadata: expect.objectContaining({
            correlationId: 'req-1',
            operatorId: 7,
            source: 'settlement-engine',
          }),
        })
      );
    });

    it('multiple subscribers all receive the same event', async () => {
      const handler1 = vi.fn<(event: DomainEvent) => Promise<void>>().mockResolvedValue(undefined);
      const handler2 = vi.fn<(event: DomainEvent) => Promise<void>>().mockResolvedValue(undefined);
      domainEvents.subscribe(DOMAIN_EVENTS.CHARGE_CREATED, handler1);
      domainEvents.subscribe(DOMAIN_EVENTS.CHARGE_CREATED, handler2);

      await domainEvents.publish({
        type: DOMAIN_EVENTS.CHARGE_CREATED,
        payload: { chargeNo: 'CHG20260103000001' },
        metadata: { correlationId: 'req-1' },
      });

      expect(handler1).toHaveBeenCalledTimes(1);
      expect(handler2).toHaveBeenCalledTimes(1);
      expect(handler1.mock.calls[0]?.[0]).toEqual(handler2.mock.calls[0]?.[0]);
    });

    it('unsubscribe stops delivery to that handler only', async () => {
      const kept = vi.fn<(event: DomainEvent) => Promise<void>>().mockResolvedValue(undefined);
      const dropped = vi.fn<(event: DomainEvent) => Promise<void>>().mockResolvedValue(undefined);
      domainEvents.subscribe(DOMAIN_EVENTS.CHARGE_REFUNDED, kept);
      const unsubscribe = domainEvents.subscribe(DOMAIN_EVENTS.CHARGE_REFUNDED, dropped);

      unsubscribe();
      await domainEvents.publish({ type: DOMAIN_EVENTS.CHARGE_REFUNDED, payload: {}, metadata: {} });

      expect(kept).toHaveBeenCalledTimes(1);
      expect(dropped).not.toHaveBeenCalled();
    });

    it('unsubscribeAll clears all handlers', async () => {
      const handler = vi.fn<(event: DomainEvent) => Promise<void>>().mockResolvedValue(undefined);
      domainEvents.subscribe(DOMAIN_EVENTS.CHARGE_CREATED, handler);

      domainEvents.unsubscribeAll();
      await domainEvents.publish({ type: DOMAIN_EVENTS.CHARGE_CREATED, payload: {}, metadata: {} });

      expect(handler).not.toHaveBeenCalled();
    });

    it('handler that throws does not prevent other handlers from running', async () => {
      const failingHandler = vi.fn<(event: DomainEvent) => Promise<void>>().mockRejectedValue(new Error('Handler failed'));
      const succeedingHandler = vi.fn<(event: DomainEvent) => Promise<void>>().mockResolvedValue(undefined);
      domainEvents.subscribe(DOMAIN_EVENTS.PAYMENT_RECEIVED, failingHandler);
      domainEvents.subscribe(DOMAIN_EVENTS.PAYMENT_RECEIVED, succeedingHandler);

      await expect(
        domainEvents.publish({ type: DOMAIN_EVENTS.PAYMENT_RECEIVED, payload: {}, metadata: {} })
      ).resolves.toBeUndefined();

      expect(failingHandler).toHaveBeenCalledTimes(1);
      expect(succeedingHandler).toHaveBeenCalledTimes(1);
    });

    it('generates a correlationId when none is given', async () => {
      const handler = vi.fn<(event: DomainEvent) => Promise<void>>().mockResolvedValue(undefined);
      domainEvents.subscribe(DOMAIN_EVENTS.CHARGE_CANCELLED, handler);

      await domainEvents.publish({ type: DOMAIN_EVENTS.CHARGE_CANCELLED, payload: {}, metadata: {} });

      const received = handler.mock.calls[0]?.[0];
      expect(received?.metadata.correlationId).toMatch(/^[0-9a-f-]{36}$/);
      expect(received?.metadata.timestamp).toBeInstanceOf(Date);
    });

    it('publishing with no subscribers does not throw', async () => {
      await expect(
        domainEvents.publish({ type: DOMAIN_EVENTS.CHARGE_CREATED, payload: {}, metadata: {} })
      ).resolves.toBeUndefined();
    });
  });

  describe('event log', () => {
    it('keeps recent events in publish order', async () => {
      const bus = new InProcessEventBus();

      await bus.publish({ type: DOMAIN_EVENTS.CHARGE_CREATED, payload: { n: 1 }, metadata: {} });
      await bus.publish({ type: DOMAIN_EVENTS.PAYMENT_RECEIVED, payload: { n: 2 }, metadata: {} });
      await bus.publish({ type: DOMAIN_EVENTS.CHARGE_REFUNDED, payload: { n: 3 }, metadata: {} });

      expect(bus.getRecentEvents(2).map((entry) => entry.event.type)).toEqual(['PaymentReceived', 'ChargeRefunded']);
    });
  });
});
