export {
  createPrescriptionRepository,
  type PrescriptionRepository,
} from './prescription.repository';
