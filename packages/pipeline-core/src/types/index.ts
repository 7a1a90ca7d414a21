/**
 * Type exports for pipeline-core
 */

export type { FieldCoercion, FieldMapping, Dataset } from './field-mapping.js';

export type { TransformOutcome, RejectedRecord, TransformReport, ITransformer } from './transform.js';

export type { PipelineState, StateTransition, RunReport } from './pipeline.js';
