/**
 * Batch Module
 */

export {
  generateParameterGrid,
  type ParameterGrid,
  type ParameterSet,
  type ParameterValue,
} from './parameter-grid.js';
export { runBatch, type BatchJob, type BatchJobResult, type BatchRunOptions } from './batch-runner.js';
