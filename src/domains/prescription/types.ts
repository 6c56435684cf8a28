/**
 * Prescription Domain Types
 *
 * @module domains/prescription/types
 */

export const PRESCRIPTION_STATUS = {
  DRAFT: 0,
  SUBMITTED: 1,
  AUDITED: 2,
  DISPENSED: 3,
  REFUNDED: 4,
  /** Paid and waiting at the pharmacy window */
  PAID: 5,
} as const;

export type PrescriptionStatus = (typeof PRESCRIPTION_STATUS)[keyof typeof PRESCRIPTION_STATUS];

export interface PrescriptionLine {
  id: number;
  medicineId: number;
  quantity: number;
  /** Cents, captured when the prescription was written */
  unitPrice: number;
  /** Units actually handed out; 0 until dispensed */
  dispensedQuantity: number;
  /** Units put back by a refund; never exceeds dispensedQuantity */
  restoredQuantity: number;
}

export interface Prescription {
  id: number;
  prescriptionNo: string;
  patientId: number;
  registrationId: number | null;
  status: PrescriptionStatus;
  /** Cents */
  totalAmount: number;
  lines: PrescriptionLine[];
  createdAt: string;
  updatedAt: string;
}

export interface CreatePrescriptionInput {
  patientId: number;
  registrationId?: number;
  lines: Array<{ medicineId: number; quantity: number }>;
}

export interface NewPrescriptionLine {
  medicineId: number;
  quantity: number;
  unitPrice: number;
}
