/**
 * Domain Event Bus
 * ================
 *
 * Simple in-process event bus for decoupled cross-domain communication.
 * Events are dispatched after the publishing transaction has committed, and
 * handler failures are isolated (one handler's failure doesn't prevent others
 * from executing, and never rolls back the settlement that published it).
 *
 * Usage:
 *   // Publishing (in a domain service, after commit):
 *   await domainEvents.publish({
 *     type: DOMAIN_EVENTS.PAYMENT_RECEIVED,
 *     payload: { chargeNo: 'CHG20260103000001', actualAmount: 10000 },
 *     metadata: { correlationId: ctx.requestId },
 *   });
 *
 *   // Subscribing (in app initialization or domain module):
 *   domainEvents.subscribe(DOMAIN_EVENTS.PAYMENT_RECEIVED, async (event) => {
 *     await pharmacyQueue.notify(event.payload.chargeNo);
 *   });
 *
 * @module events/domain-event-bus
 */

import crypto from 'crypto';
import { logger } from '@/lib/logger';

// ============================================================================
// Types
// ============================================================================

export interface DomainEvent<T extends Record<string, unknown> = Record<string, unknown>> {
  type: string;
  payload: T;
  metadata: EventMetadata;
}

export interface EventMetadata {
  correlationId: string;
  operatorId?: number;
  timestamp: Date;
  source: string;
}

export type PublishableEvent = Omit<DomainEvent, 'metadata'> & {
  metadata: Partial<EventMetadata>;
};

export type EventHandler<T extends Record<string, unknown> = Record<string, unknown>> = (
  event: DomainEvent<T>
) => Promise<void>;

export interface DomainEventBus {
  publish(event: PublishableEvent): Promise<void>;
  subscribe(eventType: string, handler: EventHandler): () => void;
  unsubscribeAll(eventType?: string): void;
}

// ============================================================================
// Known Event Types
// ============================================================================

export const DOMAIN_EVENTS = {
  // Charge lifecycle
  CHARGE_CREATED: 'ChargeCreated',
  CHARGE_CANCELLED: 'ChargeCancelled',

  // Payment
  PAYMENT_RECEIVED: 'PaymentReceived',

  // Refund
  CHARGE_REFUNDED: 'ChargeRefunded',

  // Pharmacy
  PRESCRIPTION_DISPENSED: 'PrescriptionDispensed',
} as const;

// ============================================================================
// Implementation
// ============================================================================

export class InProcessEventBus implements DomainEventBus {
  private handlers = new Map<string, Set<EventHandler>>();
  private eventLog: Array<{ event: DomainEvent; timestamp: Date }> = [];
  private maxLogSize = 1000;

  async publish(event: PublishableEvent): Promise<void> {
    const fullEvent: DomainEvent = {
      type: event.type,
      payload: event.payload,
      metadata: {
        correlationId: event.metadata.correlationId ?? crypto.randomUUID(),
        operatorId: event.metadata.operatorId,
        timestamp: event.metadata.timestamp ?? new Date(),
        source: event.metadata.source ?? 'settlement-engine',
      },
    };

    // Append to in-memory event log (for debugging and audit)
    this.eventLog.push({ event: fullEvent, timestamp: new Date() });
    if (this.eventLog.length > this.maxLogSize) {
      this.eventLog = this.eventLog.slice(-this.maxLogSize);
    }

    logger.info('[EventBus] Publishing event', {
      type: fullEvent.type,
      correlationId: fullEvent.metadata.correlationId,
    });

    const handlers = this.handlers.get(event.type);
    if (!handlers || handlers.size === 0) {
      logger.debug('[EventBus] No handlers for event type', { type: event.type });
      return;
    }

    // Execute all handlers in parallel, isolating failures
    const results = await Promise.allSettled(
      Array.from(handlers).map((handler) => handler(fullEvent))
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error('[EventBus] Handler failed', result.reason, {
          type: event.type,
          correlationId: fullEvent.metadata.correlationId,
        });
      }
    }
  }

  subscribe(eventType: string, handler: EventHandler): () => void {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    logger.debug('[EventBus] Handler subscribed', {
      type: eventType,
      totalHandlers: handlers.size,
    });

    // Return unsubscribe function
    return () => {
      this.handlers.get(eventType)?.delete(handler);
    };
  }

  unsubscribeAll(eventType?: string): void {
    if (eventType) {
      this.handlers.delete(eventType);
    } else {
      this.handlers.clear();
    }
  }

  getRecentEvents(limit = 50): Array<{ event: DomainEvent; timestamp: Date }> {
    return this.eventLog.slice(-limit);
  }
}

// ============================================================================
// Singleton
// ============================================================================

export const domainEvents = new InProcessEventBus();
