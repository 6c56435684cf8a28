/**
 * Settlement store schema and guard tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase, runInTransaction, type SettlementDatabase } from '@/lib/db';
import { migrate } from '@/lib/database/schema';
import { getSqliteErrorCode } from '@/lib/database/retry';
import { createChargeRepository, type Charge, type ChargeRepository } from '@/domains/charge';

const NOW = '2026-01-03T09:00:00.000Z';

function captureSync(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

describe('settlement store', () => {
  let db: SettlementDatabase;
  let charges: ChargeRepository;
  let charge: Charge;

  beforeEach(() => {
    db = openDatabase({ path: ':memory:' });
    charges = createChargeRepository(db);
    charge = charges.insert(
      {
        chargeNo: 'CHG20260103000001',
        patientId: 1001,
        chargeType: 'REGISTRATION_ONLY',
        totalAmount: 2000,
        discountAmount: 0,
        insuranceAmount: 0,
        actualAmount: 2000,
        details: [{ lineNo: 1, itemType: 'REGISTRATION', itemRef: 1, itemName: 'Registration fee', itemAmount: 2000 }],
      },
      NOW
    );
  });

  describe('migrations', () => {
    it('records the schema version and is idempotent', () => {
      expect(db.pragma('user_version', { simple: true })).toBe(3);
      expect(migrate(db)).toBe(3);
      expect(db.pragma('user_version', { simple: true })).toBe(3);
    });
  });

  describe('charge status guard', () => {
    it('allows PENDING → PAID → REFUNDED through the repository', () => {
      expect(charges.markPaid(charge.chargeNo, 'CASH', 'TXN-1', NOW)).toBe(true);
      expect(charges.markRefunded(charge.chargeNo, 'refund', 2000, NOW)).toBe(true);
      expect(charges.findByChargeNo(charge.chargeNo)?.status).toBe(2);
    });

    it('reports a lost conditional update instead of overwriting', () => {
      charges.markCancelled(charge.chargeNo, 'duplicate', NOW);

      expect(charges.markPaid(charge.chargeNo, 'CASH', 'TXN-1', NOW)).toBe(false);
      expect(charges.findByChargeNo(charge.chargeNo)?.transactionNo).toBeNull();
    });

    it.each([
      ['PENDING → REFUNDED', 'UPDATE charges SET status = 2 WHERE id = ?', []],
      ['CANCELLED → PENDING', 'UPDATE charges SET status = 0 WHERE id = ?', ['cancel']],
      ['REFUNDED → PAID', 'UPDATE charges SET status = 1 WHERE id = ?', ['pay', 'refund']],
    ] as const)('rejects %s at the store', (_label, sql, setup) => {
      for (const step of setup) {
        if (step === 'cancel') charges.markCancelled(charge.chargeNo, 'x', NOW);
        if (step === 'pay') charges.markPaid(charge.chargeNo, 'CASH', 'TXN-1', NOW);
        if (step === 'refund') charges.markRefunded(charge.chargeNo, 'x', 2000, NOW);
      }

      const error = captureSync(() => db.prepare(sql).run(charge.id));

      expect(getSqliteErrorCode(error)).toBe('SQLITE_CONSTRAINT_TRIGGER');
      expect(error).toMatchObject({ message: 'illegal charge status transition' });
    });
  });

  describe('immutability', () => {
    it('rejects changes to amounts', () => {
      expect(() => db.prepare('UPDATE charges SET actual_amount = 1 WHERE id = ?').run(charge.id)).toThrow(
        'charge identity and amounts are immutable'
      );
    });

    it('rejects changes to detail lines', () => {
      expect(() => db.prepare('UPDATE charge_details SET item_amount = 1 WHERE charge_id = ?').run(charge.id)).toThrow(
        'charge details are immutable'
      );
    });

    it('never deletes a charge', () => {
      expect(() => db.prepare('DELETE FROM charges WHERE id = ?').run(charge.id)).toThrow('charges are never deleted');
    });
  });

  describe('constraints', () => {
    it('keeps transaction numbers unique across charges', () => {
      const other = charges.insert(
        {
          chargeNo: 'CHG20260103000002',
          patientId: 1002,
          chargeType: 'REGISTRATION_ONLY',
          totalAmount: 1500,
          discountAmount: 0,
          insuranceAmount: 0,
          actualAmount: 1500,
          details: [{ lineNo: 1, itemType: 'REGISTRATION', itemRef: 2, itemName: 'Registration fee', itemAmount: 1500 }],
        },
        NOW
      );
      charges.markPaid(charge.chargeNo, 'CASH', 'TXN-1', NOW);

      const error = captureSync(() => charges.markPaid(other.chargeNo, 'CASH', 'TXN-1', NOW));

      expect(getSqliteErrorCode(error)).toBe('SQLITE_CONSTRAINT_UNIQUE');
    });

    it('rejects a refund above the actual amount', () => {
      charges.markPaid(charge.chargeNo, 'CASH', 'TXN-1', NOW);

      const error = captureSync(() => charges.markRefunded(charge.chargeNo, 'x', 2001, NOW));

      expect(getSqliteErrorCode(error)).toBe('SQLITE_CONSTRAINT_CHECK');
    });

    it('rolls back a failed transaction as a whole', () => {
      const attempt = () =>
        runInTransaction(db, () => {
          charges.markPaid(charge.chargeNo, 'CASH', 'TXN-1', NOW);
          db.prepare('UPDATE charges SET total_amount = 1 WHERE id = ?').run(charge.id);
        });

      expect(attempt).toThrow('charge identity and amounts are immutable');
      expect(charges.findByChargeNo(charge.chargeNo)?.status).toBe(0);
    });
  });
});
