/**
 * FieldMapper
 *
 * Maps one raw record onto a dataset's columns. A record is accepted
 * whole or rejected whole: any present value that fails its coercion,
 * or any required column left empty, rejects it.
 */

import {
  TransformError,
  isAbsent,
  readPath,
  type ColumnValue,
  type RawRecord,
  type TransformedRecord,
} from '@geosync/core';
import type { Dataset, FieldMapping, TransformOutcome } from '../types/index.js';
import { applyCoercion } from './coercions.js';

function sourcePaths(mapping: FieldMapping): readonly string[] {
  return typeof mapping.source === 'string' ? [mapping.source] : mapping.source;
}

export class FieldMapper {
  /**
   * Read the source value(s) for a mapping; null when absent
   */
  readSource(record: RawRecord, mapping: FieldMapping): unknown[] | null {
    const values = sourcePaths(mapping).map((path) => readPath(record, path));
    if (values.some(isAbsent)) {
      if (!mapping.fallback) return null;
      const fallback = mapping.fallback(record);
      return isAbsent(fallback) ? null : [fallback];
    }
    return values;
  }

  /**
   * Transform a raw record into the dataset's column set
   */
  mapRecord(record: RawRecord, index: number, dataset: Dataset): TransformOutcome {
    const mapped: TransformedRecord = {};

    for (const mapping of dataset.fields) {
      const values = this.readSource(record, mapping);
      if (values === null) {
        mapped[mapping.target] = null;
        continue;
      }

      const coerced = applyCoercion(mapping.coerce, values);
      if (!coerced.ok) {
        return {
          ok: false,
          error: new TransformError({
            code: 'COERCION_FAILED',
            message: `${mapping.target}: ${coerced.reason}`,
            field: mapping.target,
            recordIndex: index,
          }),
        };
      }
      mapped[mapping.target] = coerced.value;
    }

    const output: TransformedRecord = {};
    for (const column of dataset.table.columns) {
      const value: ColumnValue = mapped[column.name] ?? null;
      if (value === null && column.required) {
        return {
          ok: false,
          error: new TransformError({
            code: 'MISSING_FIELD',
            message: `${column.name}: required value is missing`,
            field: column.name,
            recordIndex: index,
          }),
        };
      }
      output[column.name] = value;
    }

    return { ok: true, record: output };
  }
}
