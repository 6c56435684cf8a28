/**
 * Registration Repository
 *
 * @module domains/registration/repositories
 */

import type { SettlementDatabase } from '@/lib/db';
import { REGISTRATION_STATUS, type Registration, type RegistrationStatus } from '../types';

interface RegistrationRow {
  id: number;
  reg_no: string;
  patient_id: number;
  status: number;
  registration_fee: number;
  created_at: string;
  updated_at: string;
}

const STATUS_VALUES: readonly RegistrationStatus[] = Object.values(REGISTRATION_STATUS);

function toStatus(value: number): RegistrationStatus {
  const status = STATUS_VALUES.find((candidate) => candidate === value);
  if (status === undefined) {
    throw new Error(`Unknown registration status ${value}`);
  }
  return status;
}

function toRegistration(row: RegistrationRow): Registration {
  return {
    id: row.id,
    regNo: row.reg_no,
    patientId: row.patient_id,
    status: toStatus(row.status),
    registrationFee: row.registration_fee,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createRegistrationRepository(db: SettlementDatabase) {
  const findByIdStmt = db.prepare<[number], RegistrationRow>(
    'SELECT * FROM registrations WHERE id = ?'
  );
  const insertStmt = db.prepare<[string, number, number, number, string, string], RegistrationRow>(`
    INSERT INTO registrations (reg_no, patient_id, status, registration_fee, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
    RETURNING *
  `);
  const transitionStmt = db.prepare<[RegistrationStatus, string, number, RegistrationStatus]>(
    'UPDATE registrations SET status = ?, updated_at = ? WHERE id = ? AND status = ?'
  );

  return {
    findById(id: number): Registration | null {
      const row = findByIdStmt.get(id);
      return row ? toRegistration(row) : null;
    },

    insert(
      regNo: string,
      patientId: number,
      registrationFee: number,
      status: RegistrationStatus,
      now: string
    ): Registration {
      const row = insertStmt.get(regNo, patientId, status, registrationFee, now, now);
      if (!row) {
        throw new Error('Registration insert returned no row');
      }
      return toRegistration(row);
    },

    /**
     * Conditional status move; returns false when the row was not in `from`.
     */
    transition(id: number, from: RegistrationStatus, to: RegistrationStatus, now: string): boolean {
      return transitionStmt.run(to, now, id, from).changes === 1;
    },
  };
}

export type RegistrationRepository = ReturnType<typeof createRegistrationRepository>;
