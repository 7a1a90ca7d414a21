/**
 * Transform result types
 */

import type { RawRecord, TransformError, TransformedRecord } from '@geosync/core';

/** Outcome of mapping one raw record */
export type TransformOutcome =
  | { ok: true; record: TransformedRecord }
  | { ok: false; error: TransformError };

export interface RejectedRecord {
  /** Position in the extracted collection */
  index: number;
  error: TransformError;
}

export interface TransformReport {
  inputCount: number;
  /** Accepted records, in input order */
  records: TransformedRecord[];
  rejected: RejectedRecord[];
}

export interface ITransformer {
  transform(records: RawRecord[]): TransformReport;
}
