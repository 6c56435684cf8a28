/**
 * Prescription Domain
 * ===================
 *
 * Public API for prescription operations.
 *
 * @module domains/prescription
 */

export * from './services';
export { createPrescriptionRepository, type PrescriptionRepository } from './repositories';
export {
  PRESCRIPTION_STATUS,
  type Prescription,
  type PrescriptionLine,
  type PrescriptionStatus,
  type CreatePrescriptionInput,
} from './types';
