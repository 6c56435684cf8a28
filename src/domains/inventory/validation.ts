/**
 * Inventory Domain Validation
 *
 * @module domains/inventory/validation
 */

import { z } from 'zod';
import { ADJUSTMENT_REASONS } from './types';

export const adjustInventorySchema = z.object({
  medicineId: z.number().int().positive(),
  delta: z
    .number()
    .int('delta must be a whole number of units')
    .refine((value) => value !== 0, { message: 'delta must not be zero' }),
  reason: z.enum(ADJUSTMENT_REASONS),
  reference: z.string().trim().min(1).max(64).optional(),
});

export const createMedicineSchema = z.object({
  name: z.string().trim().min(1).max(100),
  unitPrice: z.number().int().nonnegative(),
  stockQuantity: z.number().int().nonnegative(),
});
