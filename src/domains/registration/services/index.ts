export {
  createRegistrationService,
  type RegistrationService,
  type RegistrationServiceDeps,
} from './registration.service';
