export {
  createInventoryAdjuster,
  type InventoryAdjuster,
  type InventoryAdjusterDeps,
} from './inventory-adjuster';
