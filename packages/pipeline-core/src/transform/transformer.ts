/**
 * Transformer
 *
 * Applies a dataset's mappings to every extracted record. Pure: no I/O,
 * and the same input always yields the same report.
 */

import type { RawRecord, TransformedRecord } from '@geosync/core';
import type { Dataset, ITransformer, RejectedRecord, TransformReport } from '../types/index.js';
import { FieldMapper } from './field-mapper.js';

export class Transformer implements ITransformer {
  readonly dataset: Dataset;
  private readonly mapper: FieldMapper;

  constructor(dataset: Dataset, mapper: FieldMapper = new FieldMapper()) {
    this.dataset = dataset;
    this.mapper = mapper;
  }

  transform(records: RawRecord[]): TransformReport {
    const accepted: TransformedRecord[] = [];
    const rejected: RejectedRecord[] = [];

    records.forEach((record, index) => {
      const outcome = this.mapper.mapRecord(record, index, this.dataset);
      if (outcome.ok) {
        accepted.push(outcome.record);
      } else {
        rejected.push({ index, error: outcome.error });
      }
    });

    return { inputCount: records.length, records: accepted, rejected };
  }
}
