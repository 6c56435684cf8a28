export {
  createRegistrationRepository,
  type RegistrationRepository,
} from './registration.repository';
