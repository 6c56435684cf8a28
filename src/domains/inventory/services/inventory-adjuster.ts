/**
 * Inventory Adjuster
 * ==================
 *
 * The only writer of medicine stock. Every movement is a single guarded
 * UPDATE plus a ledger row, applied in its own savepoint so a caller's
 * transaction (dispense, refund) commits or rolls back with it.
 *
 * Synchronous on purpose: it runs inside better-sqlite3 transactions.
 *
 * @module domains/inventory/services
 */

import { logger } from '@/lib/logger';
import { runInTransaction, type SettlementDatabase } from '@/lib/db';
import { isTransientStoreError, retrySync } from '@/lib/database/retry';
import {
  BusinessRuleError,
  Errors,
  ServiceUnavailableError,
} from '../../shared/errors';
import { systemClock, type Clock } from '../../shared/types';
import { parseOrThrow } from '../../shared/validation';
import type { MedicineRepository } from '../repositories';
import type {
  AdjustInventoryInput,
  CreateMedicineInput,
  InventoryAdjustment,
  Medicine,
} from '../types';
import { adjustInventorySchema, createMedicineSchema } from '../validation';

export interface InventoryAdjuster {
  adjust(input: AdjustInventoryInput): InventoryAdjustment;
  getMedicine(medicineId: number): Medicine;
  listAdjustments(medicineId: number): InventoryAdjustment[];
  registerMedicine(input: CreateMedicineInput): Medicine;
}

export interface InventoryAdjusterDeps {
  db: SettlementDatabase;
  medicines: MedicineRepository;
  clock?: Clock;
  maxRetries: number;
}

export function createInventoryAdjuster(deps: InventoryAdjusterDeps): InventoryAdjuster {
  const { db, medicines, clock = systemClock, maxRetries } = deps;

  function applyOnce(input: AdjustInventoryInput): InventoryAdjustment {
    return runInTransaction(db, () => {
      const now = clock().toISOString();
      const stockAfter = medicines.applyDelta(input.medicineId, input.delta, now);

      if (stockAfter === null) {
        const medicine = medicines.findById(input.medicineId);
        if (!medicine) {
          throw Errors.medicineNotFound(input.medicineId);
        }
        throw new BusinessRuleError(
          'INSUFFICIENT_STOCK',
          `Insufficient stock for medicine ${medicine.id}: have ${medicine.stockQuantity}, need ${-input.delta}`,
          { medicineId: medicine.id, stockQuantity: medicine.stockQuantity, delta: input.delta }
        );
      }

      return medicines.insertAdjustment(
        input.medicineId,
        input.delta,
        input.reason,
        input.reference ?? null,
        stockAfter,
        now
      );
    });
  }

  return {
    adjust(rawInput: AdjustInventoryInput): InventoryAdjustment {
      const input = parseOrThrow(adjustInventorySchema, rawInput, 'Invalid inventory adjustment');

      let adjustment: InventoryAdjustment;
      try {
        adjustment = retrySync(() => applyOnce(input), {
          maxRetries,
          retryOn: isTransientStoreError,
          label: `inventory adjust ${input.medicineId}`,
        });
      } catch (error) {
        if (isTransientStoreError(error)) {
          throw new ServiceUnavailableError('Inventory store unavailable', 1);
        }
        throw error;
      }

      logger.db('adjust', 'medicines', {
        medicineId: adjustment.medicineId,
        delta: adjustment.delta,
        reason: adjustment.reason,
        reference: adjustment.reference,
        stockAfter: adjustment.stockAfter,
      });

      return adjustment;
    },

    getMedicine(medicineId: number): Medicine {
      const medicine = medicines.findById(medicineId);
      if (!medicine) {
        throw Errors.medicineNotFound(medicineId);
      }
      return medicine;
    },

    listAdjustments(medicineId: number): InventoryAdjustment[] {
      return medicines.listAdjustments(medicineId);
    },

    registerMedicine(rawInput: CreateMedicineInput): Medicine {
      const input = parseOrThrow(createMedicineSchema, rawInput, 'Invalid medicine');
      return medicines.create(input, clock().toISOString());
    },
  };
}
