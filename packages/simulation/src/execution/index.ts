/**
 * Execution Module Index
 * ======================
 * Exports execution models and cost primitives.
 */

export * from './fees.js';
export * from './execution-model.js';
