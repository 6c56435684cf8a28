/**
 * Settlement Service Container
 * ============================
 *
 * Wires repositories and services over one store. Route handlers use the
 * process-wide instance from `getSettlementServices()`; tests build their
 * own over an in-memory database.
 *
 * @module domains/container
 */

import { getEnv } from '@/lib/config/env';
import { getDb, type SettlementDatabase } from '@/lib/db';
import { domainEvents, type DomainEventBus } from '@/lib/events/domain-event-bus';
import { systemClock, type Clock } from './shared/types';
import {
  createChargeAggregator,
  createChargeRepository,
  createPaymentProcessor,
  createRefundProcessor,
  createSettlementReportEngine,
  MockPaymentProvider,
  type ChargeAggregator,
  type ChargeRepository,
  type PaymentProcessor,
  type RefundProcessor,
  type SettlementReportEngine,
} from './charge';
import {
  createInventoryAdjuster,
  createMedicineRepository,
  type InventoryAdjuster,
} from './inventory';
import {
  createPrescriptionRepository,
  createPrescriptionService,
  type PrescriptionRepository,
  type PrescriptionService,
} from './prescription';
import {
  createRegistrationRepository,
  createRegistrationService,
  type RegistrationRepository,
  type RegistrationService,
} from './registration';
import {
  createSequenceGenerator,
  createSequenceHealthProbe,
  createSequenceRepository,
  type SequenceGenerator,
  type SequenceHealthProbe,
} from './sequence';

export interface SettlementServices {
  db: SettlementDatabase;
  repositories: {
    charges: ChargeRepository;
    registrations: RegistrationRepository;
    prescriptions: PrescriptionRepository;
  };
  sequence: SequenceGenerator;
  sequenceHealth: SequenceHealthProbe;
  inventory: InventoryAdjuster;
  registrationService: RegistrationService;
  prescriptionService: PrescriptionService;
  aggregator: ChargeAggregator;
  payments: PaymentProcessor;
  refunds: RefundProcessor;
  reports: SettlementReportEngine;
  paymentProvider: MockPaymentProvider;
}

export interface SettlementServicesOptions {
  db: SettlementDatabase;
  clock?: Clock;
  events?: DomainEventBus;
  sequenceMaxRetries?: number;
  sequenceRetryDelayMs?: number;
  inventoryMaxRetries?: number;
  refundWindowDays?: number;
}

export function createSettlementServices(options: SettlementServicesOptions): SettlementServices {
  const env = getEnv();
  const { db, clock = systemClock, events = domainEvents } = options;

  const charges = createChargeRepository(db);
  const registrations = createRegistrationRepository(db);
  const prescriptions = createPrescriptionRepository(db);

  const sequence = createSequenceGenerator({
    repository: createSequenceRepository(db),
    clock,
    maxRetries: options.sequenceMaxRetries ?? env.SEQUENCE_MAX_RETRIES,
    retryDelayMs: options.sequenceRetryDelayMs ?? env.SEQUENCE_RETRY_DELAY_MS,
  });
  const inventory = createInventoryAdjuster({
    db,
    medicines: createMedicineRepository(db),
    clock,
    maxRetries: options.inventoryMaxRetries ?? env.INVENTORY_MAX_RETRIES,
  });
  const payments = createPaymentProcessor({ db, charges, registrations, prescriptions, events, clock });

  return {
    db,
    repositories: { charges, registrations, prescriptions },
    sequence,
    sequenceHealth: createSequenceHealthProbe({ generator: sequence, clock }),
    inventory,
    registrationService: createRegistrationService({ registrations, sequence, clock }),
    prescriptionService: createPrescriptionService({
      db,
      prescriptions,
      registrations,
      adjuster: inventory,
      sequence,
      events,
      clock,
    }),
    aggregator: createChargeAggregator({ db, charges, registrations, prescriptions, sequence, events, clock }),
    payments,
    refunds: createRefundProcessor({
      db,
      charges,
      registrations,
      prescriptions,
      adjuster: inventory,
      events,
      refundWindowDays: options.refundWindowDays ?? env.REFUND_WINDOW_DAYS,
      clock,
    }),
    reports: createSettlementReportEngine({ charges }),
    paymentProvider: new MockPaymentProvider(payments, clock),
  };
}

let shared: SettlementServices | undefined;

/**
 * Process-wide services over the configured store. Starts the sequence
 * health probe on first use.
 */
export function getSettlementServices(): SettlementServices {
  if (!shared) {
    shared = createSettlementServices({ db: getDb() });
    shared.sequenceHealth.startSequenceHealthProbe(getEnv().SEQUENCE_HEALTH_INTERVAL_MS);
  }
  return shared;
}

/**
 * Drop the process-wide instance (tests)
 */
export function resetSettlementServices(): void {
  shared?.sequenceHealth.stopSequenceHealthProbe();
  shared = undefined;
}
