/**
 * Sequence Repository
 * ===================
 *
 * Persistent per-kind, per-day counters.
 *
 * @module domains/sequence/repositories
 */

import type { SettlementDatabase } from '@/lib/db';
import type { SequenceKind } from '../types';

interface CounterRow {
  value: number;
}

export function createSequenceRepository(db: SettlementDatabase) {
  const incrementStmt = db.prepare<[string, string], CounterRow>(`
    INSERT INTO sequences (kind, period, value) VALUES (?, ?, 1)
    ON CONFLICT (kind, period) DO UPDATE SET value = value + 1
    RETURNING value
  `);
  const seedStmt = db.prepare<[string, string, number]>(`
    INSERT INTO sequences (kind, period, value) VALUES (?, ?, ?)
    ON CONFLICT (kind, period) DO UPDATE SET value = excluded.value
  `);

  return {
    /**
     * Atomically bump and return the counter for (kind, period).
     * A single statement, so concurrent connections never see the same value.
     */
    increment(kind: SequenceKind, period: string): number {
      const row = incrementStmt.get(kind, period);
      if (!row) {
        throw new Error(`Sequence upsert returned no row for ${kind}/${period}`);
      }
      return row.value;
    },

    /**
     * Set a counter outright (data migration, tests)
     */
    seed(kind: SequenceKind, period: string, value: number): void {
      seedStmt.run(kind, period, value);
    },
  };
}

export type SequenceRepository = ReturnType<typeof createSequenceRepository>;
