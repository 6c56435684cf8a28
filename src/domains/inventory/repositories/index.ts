export { createMedicineRepository, type MedicineRepository } from './medicine.repository';
