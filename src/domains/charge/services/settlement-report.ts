/**
 * Settlement Report Engine
 * ========================
 *
 * Read-only aggregates over finalized charges for cashier shift close and
 * daily reconciliation. Ranges are half-open: [from, to).
 *
 * @module domains/charge/services/settlement-report
 */

import { parseOrThrow } from '../../shared/validation';
import { toChargeStatus, toPaymentMethod, type ChargeRepository } from '../repositories';
import { chargeStatusName } from '../status';
import {
  CHARGE_STATUS,
  type DailySettlement,
  type MethodBreakdown,
  type PaymentMethod,
  type SettlementStatistics,
} from '../types';
import { settlementDateSchema, statisticsRangeSchema } from '../validation';

export interface SettlementRange {
  from: string;
  to: string;
}

export interface SettlementReportEngine {
  getSettlementStatistics(range: SettlementRange): SettlementStatistics;
  getDailySettlement(date: string): DailySettlement;
}

export interface SettlementReportDeps {
  charges: ChargeRepository;
}

export function createSettlementReportEngine(deps: SettlementReportDeps): SettlementReportEngine {
  const { charges } = deps;

  function getSettlementStatistics(rawRange: SettlementRange): SettlementStatistics {
    const { from, to } = parseOrThrow(statisticsRangeSchema, rawRange, 'Invalid settlement range');

    const chargeCounts: SettlementStatistics['chargeCounts'] = {
      PENDING: 0,
      PAID: 0,
      REFUNDED: 0,
      CANCELLED: 0,
    };
    for (const row of charges.countByStatusCreatedBetween(from, to)) {
      chargeCounts[chargeStatusName(toChargeStatus(row.status))] = row.count;
    }

    let paidAmount = 0;
    let collectedAmount = 0;
    const byPaymentMethod: Partial<Record<PaymentMethod, MethodBreakdown>> = {};
    for (const row of charges.collectionsBetween(from, to)) {
      collectedAmount += row.amount;
      if (row.status === CHARGE_STATUS.PAID) {
        paidAmount += row.amount;
      }
      if (row.payment_method !== null) {
        const method = toPaymentMethod(row.payment_method);
        const entry = byPaymentMethod[method] ?? { count: 0, amount: 0 };
        entry.count += row.count;
        entry.amount += row.amount;
        byPaymentMethod[method] = entry;
      }
    }

    const refunds = charges.refundTotalsBetween(from, to);

    return {
      from,
      to,
      chargeCounts,
      paidAmount,
      collectedAmount,
      refunds: { count: refunds.count, amount: refunds.amount },
      netCollection: collectedAmount - refunds.amount,
      byPaymentMethod,
    };
  }

  return {
    getSettlementStatistics,

    getDailySettlement(rawDate: string): DailySettlement {
      const date = parseOrThrow(settlementDateSchema, rawDate, 'Invalid settlement date');
      const start = new Date(`${date}T00:00:00.000Z`);
      const end = new Date(start.getTime() + 24 * 60 * 60 * 1000);

      return {
        date,
        ...getSettlementStatistics({ from: start.toISOString(), to: end.toISOString() }),
      };
    },
  };
}
