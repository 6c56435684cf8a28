/**
 * Inventory Domain Types
 *
 * @module domains/inventory/types
 */

export const ADJUSTMENT_REASONS = ['DISPENSE', 'REFUND_RESTORE', 'MANUAL'] as const;

export type AdjustmentReason = (typeof ADJUSTMENT_REASONS)[number];

export interface Medicine {
  id: number;
  name: string;
  /** Cents per unit */
  unitPrice: number;
  /** Never negative */
  stockQuantity: number;
  updatedAt: string;
}

export interface InventoryAdjustment {
  id: number;
  medicineId: number;
  delta: number;
  reason: AdjustmentReason;
  /** Business key that caused the movement, e.g. a charge or prescription number */
  reference: string | null;
  stockAfter: number;
  createdAt: string;
}

export interface AdjustInventoryInput {
  medicineId: number;
  delta: number;
  reason: AdjustmentReason;
  reference?: string;
}

export interface CreateMedicineInput {
  name: string;
  unitPrice: number;
  stockQuantity: number;
}
