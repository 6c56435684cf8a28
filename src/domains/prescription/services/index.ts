export {
  createPrescriptionService,
  prescriptionStatusName,
  type PrescriptionService,
  type PrescriptionServiceDeps,
} from './prescription.service';
