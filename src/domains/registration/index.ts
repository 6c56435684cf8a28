/**
 * Registration Domain
 *
 * @module domains/registration
 */

export * from './services';
export { createRegistrationRepository, type RegistrationRepository } from './repositories';
export {
  REGISTRATION_STATUS,
  BILLABLE_REGISTRATION_STATUSES,
  type Registration,
  type RegistrationStatus,
  type CreateRegistrationInput,
} from './types';
