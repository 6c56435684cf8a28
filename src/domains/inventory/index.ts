/**
 * Inventory Domain
 * ================
 *
 * Medicine stock and its adjustment ledger.
 *
 * @module domains/inventory
 */

export * from './services';
export { createMedicineRepository, type MedicineRepository } from './repositories';
export {
  ADJUSTMENT_REASONS,
  type AdjustmentReason,
  type AdjustInventoryInput,
  type CreateMedicineInput,
  type InventoryAdjustment,
  type Medicine,
} from './types';
