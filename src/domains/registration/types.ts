/**
 * Registration Domain Types
 *
 * @module domains/registration/types
 */

export const REGISTRATION_STATUS = {
  WAITING: 0,
  COMPLETED: 1,
  CANCELLED: 2,
  REFUNDED: 3,
  PAID_REGISTRATION: 4,
  IN_CONSULTATION: 5,
} as const;

export type RegistrationStatus = (typeof REGISTRATION_STATUS)[keyof typeof REGISTRATION_STATUS];

/** States in which the registration fee may be charged */
export const BILLABLE_REGISTRATION_STATUSES: readonly RegistrationStatus[] = [
  REGISTRATION_STATUS.WAITING,
  REGISTRATION_STATUS.IN_CONSULTATION,
  REGISTRATION_STATUS.COMPLETED,
];

export interface Registration {
  id: number;
  regNo: string;
  patientId: number;
  status: RegistrationStatus;
  /** Cents */
  registrationFee: number;
  createdAt: string;
  updatedAt: string;
}

export interface CreateRegistrationInput {
  patientId: number;
  registrationFee: number;
}
