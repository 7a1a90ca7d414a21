/**
 * Multi-row INSERT statements
 */

import {
  isGeometryColumn,
  primaryKeyOf,
  type ColumnValue,
  type TableSchema,
  type TransformedRecord,
} from '@geosync/core';
import { quoteIdentifier } from './ddl.js';

/** PostgreSQL accepts at most this many bind parameters per statement */
export const MAX_BIND_PARAMETERS = 65_535;

export interface InsertStatement {
  text: string;
  values: ColumnValue[];
}

/**
 * Largest chunk that fits both the requested batch size and the bind limit
 */
export function effectiveBatchSize(schema: TableSchema, batchSize: number): number {
  const perRow = Math.max(1, schema.columns.length);
  return Math.max(1, Math.min(Math.floor(batchSize), Math.floor(MAX_BIND_PARAMETERS / perRow)));
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * One INSERT for all rows; rows whose primary key already exists are skipped
 */
export function buildInsertStatement(schema: TableSchema, records: TransformedRecord[]): InsertStatement {
  const table = quoteIdentifier(schema.name, 'table');
  const columnList = schema.columns.map((c) => quoteIdentifier(c.name, 'column')).join(', ');
  const values: ColumnValue[] = [];

  const tuples = records.map((record) => {
    const placeholders = schema.columns.map((column) => {
      values.push(record[column.name] ?? null);
      const param = `$${values.length}`;
      return isGeometryColumn(column) ? `ST_GeomFromText(${param}, ${column.srid})` : param;
    });
    return `(${placeholders.join(', ')})`;
  });

  let text = `INSERT INTO ${table} (${columnList}) VALUES ${tuples.join(', ')}`;

  const pk = primaryKeyOf(schema);
  if (pk) {
    text += ` ON CONFLICT (${quoteIdentifier(pk, 'column')}) DO NOTHING`;
  }

  return { text, values };
}
