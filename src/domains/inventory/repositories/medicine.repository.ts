/**
 * Medicine Repository
 * ===================
 *
 * Stock rows and the append-only adjustment ledger.
 *
 * @module domains/inventory/repositories
 */

import type { SettlementDatabase } from '@/lib/db';
import type {
  AdjustmentReason,
  CreateMedicineInput,
  InventoryAdjustment,
  Medicine,
} from '../types';

interface MedicineRow {
  id: number;
  name: string;
  unit_price: number;
  stock_quantity: number;
  updated_at: string;
}

interface AdjustmentRow {
  id: number;
  medicine_id: number;
  delta: number;
  reason: AdjustmentReason;
  reference: string | null;
  stock_after: number;
  created_at: string;
}

function toMedicine(row: MedicineRow): Medicine {
  return {
    id: row.id,
    name: row.name,
    unitPrice: row.unit_price,
    stockQuantity: row.stock_quantity,
    updatedAt: row.updated_at,
  };
}

function toAdjustment(row: AdjustmentRow): InventoryAdjustment {
  return {
    id: row.id,
    medicineId: row.medicine_id,
    delta: row.delta,
    reason: row.reason,
    reference: row.reference,
    stockAfter: row.stock_after,
    createdAt: row.created_at,
  };
}

export function createMedicineRepository(db: SettlementDatabase) {
  const findByIdStmt = db.prepare<[number], MedicineRow>('SELECT * FROM medicines WHERE id = ?');
  const insertStmt = db.prepare<[string, number, number, string], MedicineRow>(`
    INSERT INTO medicines (name, unit_price, stock_quantity, updated_at)
    VALUES (?, ?, ?, ?)
    RETURNING *
  `);
  // Guarded so stock never drops below zero, even under concurrent writers
  const applyDeltaStmt = db.prepare<[number, string, number, number], { stock_quantity: number }>(`
    UPDATE medicines
    SET stock_quantity = stock_quantity + ?, updated_at = ?
    WHERE id = ? AND stock_quantity + ? >= 0
    RETURNING stock_quantity
  `);
  const insertAdjustmentStmt = db.prepare<
    [number, number, AdjustmentReason, string | null, number, string],
    AdjustmentRow
  >(`
    INSERT INTO inventory_adjustments (medicine_id, delta, reason, reference, stock_after, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
    RETURNING *
  `);
  const listAdjustmentsStmt = db.prepare<[number], AdjustmentRow>(
    'SELECT * FROM inventory_adjustments WHERE medicine_id = ? ORDER BY id'
  );

  return {
    findById(id: number): Medicine | null {
      const row = findByIdStmt.get(id);
      return row ? toMedicine(row) : null;
    },

    create(input: CreateMedicineInput, now: string): Medicine {
      const row = insertStmt.get(input.name, input.unitPrice, input.stockQuantity, now);
      if (!row) {
        throw new Error('Medicine insert returned no row');
      }
      return toMedicine(row);
    },

    /**
     * Returns the new stock level, or null when the row is missing or the
     * delta would take stock negative.
     */
    applyDelta(id: number, delta: number, now: string): number | null {
      return applyDeltaStmt.get(delta, now, id, delta)?.stock_quantity ?? null;
    },

    insertAdjustment(
      medicineId: number,
      delta: number,
      reason: AdjustmentReason,
      reference: string | null,
      stockAfter: number,
      now: string
    ): InventoryAdjustment {
      const row = insertAdjustmentStmt.get(medicineId, delta, reason, reference, stockAfter, now);
      if (!row) {
        throw new Error('Adjustment insert returned no row');
      }
      return toAdjustment(row);
    },

    listAdjustments(medicineId: number): InventoryAdjustment[] {
      return listAdjustmentsStmt.all(medicineId).map(toAdjustment);
    },
  };
}

export type MedicineRepository = ReturnType<typeof createMedicineRepository>;
