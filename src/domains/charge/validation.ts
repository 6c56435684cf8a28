/**
 * Charge Domain Validation
 * ========================
 *
 * Zod schemas for every settlement entry point. Money is integer cents,
 * so every amount is checked as a non-negative safe integer.
 *
 * @module domains/charge/validation
 */

import { z } from 'zod';
import { CHARGE_ITEM_TYPES, CHARGE_STATUS, PAYMENT_METHODS } from './types';

const cents = z.number().int('amount must be whole cents').nonnegative().max(Number.MAX_SAFE_INTEGER);

const chargeNo = z
  .string()
  .trim()
  .regex(/^CHG\d{14}$/, 'chargeNo must look like CHG + 14 digits');

export const chargeSourceSchema = z.object({
  type: z.enum(CHARGE_ITEM_TYPES),
  id: z.number().int().positive(),
});

export const createChargeSchema = z
  .object({
    patientId: z.number().int().positive(),
    sources: z.array(chargeSourceSchema).min(1, 'At least one billable source is required'),
    declaredTotal: cents.optional(),
    discountAmount: cents.default(0),
    insuranceAmount: cents.default(0),
  })
  .superRefine((input, ctx) => {
    const seen = new Set<string>();
    input.sources.forEach((source, index) => {
      const key = `${source.type}:${source.id}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index],
          message: `Duplicate source ${key}`,
        });
      }
      seen.add(key);
    });
  });

export type CreateChargeData = z.infer<typeof createChargeSchema>;

export const cancelChargeSchema = z.object({
  chargeNo,
  reason: z.string().trim().min(1, 'reason is required').max(200),
});

export const processPaymentSchema = z.object({
  chargeNo,
  paymentMethod: z.enum(PAYMENT_METHODS),
  transactionNo: z.string().trim().min(1, 'transactionNo is required').max(64),
  paidAmount: cents.optional(),
});

export const processRefundSchema = z.object({
  chargeNo,
  reason: z.string().trim().min(1, 'reason is required').max(200),
  restoreInventory: z.boolean().default(true),
  refundAmount: z.number().int('amount must be whole cents').optional(),
});

// Stored timestamps always carry milliseconds; bounds are compared as text
const isoDateTime = z
  .string()
  .datetime({ offset: false })
  .transform((value) => new Date(value).toISOString());

export const chargeQuerySchema = z.object({
  chargeNo: z.string().trim().min(1).optional(),
  patientId: z.coerce.number().int().positive().optional(),
  status: z.coerce
    .number()
    .pipe(
      z.union([
        z.literal(CHARGE_STATUS.PENDING),
        z.literal(CHARGE_STATUS.PAID),
        z.literal(CHARGE_STATUS.REFUNDED),
        z.literal(CHARGE_STATUS.CANCELLED),
      ])
    )
    .optional(),
  startDate: isoDateTime.optional(),
  endDate: isoDateTime.optional(),
  limit: z.coerce.number().int().min(1).max(200).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const settlementDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD')
  .refine(
    (value) => {
      const parsed = new Date(`${value}T00:00:00.000Z`);
      return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
    },
    { message: 'date is not a calendar day' }
  );

export const statisticsRangeSchema = z
  .object({
    from: isoDateTime,
    to: isoDateTime,
  })
  .refine((range) => range.from < range.to, { message: '`from` must be before `to`', path: ['to'] });
