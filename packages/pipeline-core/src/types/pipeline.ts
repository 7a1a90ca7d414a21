/**
 * Pipeline run types
 */

export type PipelineState =
  | 'INIT'
  | 'EXTRACTING'
  | 'TRANSFORMING'
  | 'LOADING'
  | 'DONE'
  | 'FAILED';

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
  /** Epoch milliseconds */
  at: number;
}

/** Summary of a successful run */
export interface RunReport {
  state: 'DONE';
  dataset: string;
  table: string;
  /** Raw records returned by the source */
  extracted: number;
  /** Records that passed the transform */
  transformed: number;
  /** Records excluded by the transform */
  rejected: number;
  /** Rows inserted; ids already present are skipped */
  loaded: number;
  /** Transformed records skipped because their id was already loaded */
  skipped: number;
  durationMs: number;
}
