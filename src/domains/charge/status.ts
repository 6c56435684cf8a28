import { CHARGE_STATUS, type ChargeStatus, type ChargeStatusName } from './types';

const STATUS_NAMES: Record<ChargeStatus, ChargeStatusName> = {
  [CHARGE_STATUS.PENDING]: 'PENDING',
  [CHARGE_STATUS.PAID]: 'PAID',
  [CHARGE_STATUS.REFUNDED]: 'REFUNDED',
  [CHARGE_STATUS.CANCELLED]: 'CANCELLED',
};

export function chargeStatusName(status: ChargeStatus): ChargeStatusName {
  return STATUS_NAMES[status];
}
