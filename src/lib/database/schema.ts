/**
 * Settlement Store Schema
 * =======================
 *
 * Versioned migrations applied through `PRAGMA user_version`.
 * Money columns are integer minor units (cents); timestamps are ISO-8601 UTC.
 *
 * @module lib/database/schema
 */

import type Database from 'better-sqlite3';
import { logger } from '@/lib/logger';

interface Migration {
  version: number;
  name: string;
  sql: string;
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'collaborator_tables',
    sql: `
      CREATE TABLE registrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        reg_no TEXT NOT NULL UNIQUE,
        patient_id INTEGER NOT NULL,
        status INTEGER NOT NULL DEFAULT 0 CHECK (status BETWEEN 0 AND 5),
        registration_fee INTEGER NOT NULL CHECK (registration_fee >= 0),
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE medicines (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        unit_price INTEGER NOT NULL CHECK (unit_price >= 0),
        stock_quantity INTEGER NOT NULL CHECK (stock_quantity >= 0),
        updated_at TEXT NOT NULL
      );

      CREATE TABLE prescriptions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        prescription_no TEXT NOT NULL UNIQUE,
        patient_id INTEGER NOT NULL,
        registration_id INTEGER REFERENCES registrations(id),
        status INTEGER NOT NULL DEFAULT 0 CHECK (status BETWEEN 0 AND 5),
        total_amount INTEGER NOT NULL CHECK (total_amount >= 0),
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE prescription_lines (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        prescription_id INTEGER NOT NULL REFERENCES prescriptions(id) ON DELETE CASCADE,
        medicine_id INTEGER NOT NULL REFERENCES medicines(id),
        quantity INTEGER NOT NULL CHECK (quantity > 0),
        unit_price INTEGER NOT NULL CHECK (unit_price >= 0),
        dispensed_quantity INTEGER NOT NULL DEFAULT 0 CHECK (dispensed_quantity >= 0),
        restored_quantity INTEGER NOT NULL DEFAULT 0
          CHECK (restored_quantity >= 0 AND restored_quantity <= dispensed_quantity)
      );

      CREATE INDEX ix_prescription_lines_prescription ON prescription_lines(prescription_id);
    `,
  },
  {
    version: 2,
    name: 'charges',
    sql: `
      CREATE TABLE charges (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        charge_no TEXT NOT NULL UNIQUE,
        patient_id INTEGER NOT NULL,
        charge_type TEXT NOT NULL
          CHECK (charge_type IN ('REGISTRATION_ONLY', 'PRESCRIPTION_ONLY', 'MIXED')),
        total_amount INTEGER NOT NULL CHECK (total_amount > 0),
        discount_amount INTEGER NOT NULL DEFAULT 0 CHECK (discount_amount >= 0),
        insurance_amount INTEGER NOT NULL DEFAULT 0 CHECK (insurance_amount >= 0),
        actual_amount INTEGER NOT NULL CHECK (actual_amount >= 0 AND actual_amount <= total_amount),
        status INTEGER NOT NULL DEFAULT 0 CHECK (status BETWEEN 0 AND 3),
        payment_method TEXT,
        transaction_no TEXT,
        paid_at TEXT,
        refund_reason TEXT,
        refund_amount INTEGER CHECK (refund_amount IS NULL OR (refund_amount >= 0 AND refund_amount <= actual_amount)),
        refunded_at TEXT,
        cancel_reason TEXT,
        cancelled_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE UNIQUE INDEX ux_charges_transaction_no
        ON charges(transaction_no) WHERE transaction_no IS NOT NULL;
      CREATE INDEX ix_charges_patient ON charges(patient_id);
      CREATE INDEX ix_charges_created_at ON charges(created_at);
      CREATE INDEX ix_charges_paid_at ON charges(paid_at);
      CREATE INDEX ix_charges_refunded_at ON charges(refunded_at);

      CREATE TABLE charge_details (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        charge_id INTEGER NOT NULL REFERENCES charges(id) ON DELETE CASCADE,
        line_no INTEGER NOT NULL,
        item_type TEXT NOT NULL CHECK (item_type IN ('REGISTRATION', 'PRESCRIPTION')),
        item_ref INTEGER NOT NULL,
        item_name TEXT NOT NULL,
        item_amount INTEGER NOT NULL CHECK (item_amount > 0),
        UNIQUE (charge_id, line_no)
      );

      CREATE INDEX ix_charge_details_item ON charge_details(item_type, item_ref);

      CREATE TRIGGER trg_charge_details_immutable
      BEFORE UPDATE ON charge_details
      BEGIN
        SELECT RAISE(ABORT, 'charge details are immutable');
      END;

      CREATE TRIGGER trg_charges_status_forward
      BEFORE UPDATE OF status ON charges
      WHEN NOT (
        OLD.status = NEW.status
        OR (OLD.status = 0 AND NEW.status IN (1, 3))
        OR (OLD.status = 1 AND NEW.status = 2)
      )
      BEGIN
        SELECT RAISE(ABORT, 'illegal charge status transition');
      END;

      CREATE TRIGGER trg_charges_identity_immutable
      BEFORE UPDATE OF charge_no, patient_id, total_amount, actual_amount ON charges
      WHEN NEW.charge_no <> OLD.charge_no
        OR NEW.patient_id <> OLD.patient_id
        OR NEW.total_amount <> OLD.total_amount
        OR NEW.actual_amount <> OLD.actual_amount
      BEGIN
        SELECT RAISE(ABORT, 'charge identity and amounts are immutable');
      END;

      CREATE TRIGGER trg_charges_never_deleted
      BEFORE DELETE ON charges
      BEGIN
        SELECT RAISE(ABORT, 'charges are never deleted');
      END;
    `,
  },
  {
    version: 3,
    name: 'inventory_and_sequences',
    sql: `
      CREATE TABLE inventory_adjustments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        medicine_id INTEGER NOT NULL REFERENCES medicines(id),
        delta INTEGER NOT NULL CHECK (delta <> 0),
        reason TEXT NOT NULL CHECK (reason IN ('DISPENSE', 'REFUND_RESTORE', 'MANUAL')),
        reference TEXT,
        stock_after INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX ix_inventory_adjustments_medicine ON inventory_adjustments(medicine_id);

      CREATE TABLE sequences (
        kind TEXT NOT NULL,
        period TEXT NOT NULL,
        value INTEGER NOT NULL,
        PRIMARY KEY (kind, period)
      );
    `,
  },
];

/**
 * Bring the schema up to the latest version.
 * Each migration runs in its own transaction together with the version bump.
 */
export function migrate(db: Database.Database): number {
  const current = Number(db.pragma('user_version', { simple: true }));

  for (const migration of MIGRATIONS) {
    if (migration.version <= current) continue;

    db.transaction(() => {
      db.exec(migration.sql);
      db.pragma(`user_version = ${migration.version}`);
    })();

    logger.db('migrate', migration.name, { version: migration.version });
  }

  return MIGRATIONS[MIGRATIONS.length - 1]?.version ?? current;
}
