/**
 * Prescription Repository
 * =======================
 *
 * Prescription headers and their medicine lines.
 *
 * @module domains/prescription/repositories
 */

import type { SettlementDatabase } from '@/lib/db';
import {
  PRESCRIPTION_STATUS,
  type NewPrescriptionLine,
  type Prescription,
  type PrescriptionLine,
  type PrescriptionStatus,
} from '../types';

interface PrescriptionRow {
  id: number;
  prescription_no: string;
  patient_id: number;
  registration_id: number | null;
  status: number;
  total_amount: number;
  created_at: string;
  updated_at: string;
}

interface PrescriptionLineRow {
  id: number;
  prescription_id: number;
  medicine_id: number;
  quantity: number;
  unit_price: number;
  dispensed_quantity: number;
  restored_quantity: number;
}

const STATUS_VALUES: readonly PrescriptionStatus[] = Object.values(PRESCRIPTION_STATUS);

function toStatus(value: number): PrescriptionStatus {
  const status = STATUS_VALUES.find((candidate) => candidate === value);
  if (status === undefined) {
    throw new Error(`Unknown prescription status ${value}`);
  }
  return status;
}

function toLine(row: PrescriptionLineRow): PrescriptionLine {
  return {
    id: row.id,
    medicineId: row.medicine_id,
    quantity: row.quantity,
    unitPrice: row.unit_price,
    dispensedQuantity: row.dispensed_quantity,
    restoredQuantity: row.restored_quantity,
  };
}

export function createPrescriptionRepository(db: SettlementDatabase) {
  const findByIdStmt = db.prepare<[number], PrescriptionRow>(
    'SELECT * FROM prescriptions WHERE id = ?'
  );
  const findLinesStmt = db.prepare<[number], PrescriptionLineRow>(
    'SELECT * FROM prescription_lines WHERE prescription_id = ? ORDER BY id'
  );
  const insertStmt = db.prepare<
    [string, number, number | null, PrescriptionStatus, number, string, string],
    PrescriptionRow
  >(`
    INSERT INTO prescriptions
      (prescription_no, patient_id, registration_id, status, total_amount, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    RETURNING *
  `);
  const insertLineStmt = db.prepare<[number, number, number, number]>(`
    INSERT INTO prescription_lines (prescription_id, medicine_id, quantity, unit_price)
    VALUES (?, ?, ?, ?)
  `);
  const transitionStmt = db.prepare<[PrescriptionStatus, string, number, PrescriptionStatus]>(
    'UPDATE prescriptions SET status = ?, updated_at = ? WHERE id = ? AND status = ?'
  );
  const recordDispensedStmt = db.prepare<[number, number]>(
    'UPDATE prescription_lines SET dispensed_quantity = ? WHERE id = ? AND dispensed_quantity = 0'
  );
  // A line is restored at most once: the guard only matches an unrestored line
  const markRestoredStmt = db.prepare<[number]>(`
    UPDATE prescription_lines SET restored_quantity = dispensed_quantity
    WHERE id = ? AND dispensed_quantity > 0 AND restored_quantity = 0
  `);

  function toPrescription(row: PrescriptionRow): Prescription {
    return {
      id: row.id,
      prescriptionNo: row.prescription_no,
      patientId: row.patient_id,
      registrationId: row.registration_id,
      status: toStatus(row.status),
      totalAmount: row.total_amount,
      lines: findLinesStmt.all(row.id).map(toLine),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  return {
    findById(id: number): Prescription | null {
      const row = findByIdStmt.get(id);
      return row ? toPrescription(row) : null;
    },

    /**
     * Insert header and lines; the caller owns the transaction.
     */
    insert(
      prescriptionNo: string,
      patientId: number,
      registrationId: number | null,
      totalAmount: number,
      lines: NewPrescriptionLine[],
      now: string
    ): Prescription {
      const row = insertStmt.get(
        prescriptionNo,
        patientId,
        registrationId,
        PRESCRIPTION_STATUS.DRAFT,
        totalAmount,
        now,
        now
      );
      if (!row) {
        throw new Error('Prescription insert returned no row');
      }
      for (const line of lines) {
        insertLineStmt.run(row.id, line.medicineId, line.quantity, line.unitPrice);
      }
      return toPrescription(row);
    },

    transition(
      id: number,
      from: PrescriptionStatus,
      to: PrescriptionStatus,
      now: string
    ): boolean {
      return transitionStmt.run(to, now, id, from).changes === 1;
    },

    recordDispensed(lineId: number, quantity: number): boolean {
      return recordDispensedStmt.run(quantity, lineId).changes === 1;
    },

    markRestored(lineId: number): boolean {
      return markRestoredStmt.run(lineId).changes === 1;
    },
  };
}

export type PrescriptionRepository = ReturnType<typeof createPrescriptionRepository>;
