export {
  createSequenceGenerator,
  formatPeriod,
  formatSequenceNumber,
  type SequenceGenerator,
  type SequenceGeneratorDeps,
} from './sequence.service';
export {
  createSequenceHealthProbe,
  type SequenceHealthProbe,
  type SequenceHealthProbeDeps,
} from './sequence-health';
export { SequenceMetricsRegistry } from './sequence-metrics';
