/**
 * @geosync/pipeline-core
 *
 * Field mapping, built-in datasets and the run orchestrator
 */

// Types
export * from './types/index.js';

// Transform
export * from './transform/index.js';

// Datasets
export * from './datasets/index.js';

// Orchestration
export * from './pipeline/index.js';
