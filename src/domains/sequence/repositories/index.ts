export { createSequenceRepository, type SequenceRepository } from './sequence.repository';
