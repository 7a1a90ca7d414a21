/**
 * DDL and identifier helpers for the destination table
 */

import {
  LoadError,
  isGeometryColumn,
  type ColumnDefinition,
  type TableSchema,
} from '@geosync/core';

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Validate and double-quote an identifier
 */
export function quoteIdentifier(name: string, type: string): string {
  if (!VALID_IDENTIFIER.test(name)) {
    throw new LoadError({
      code: 'SCHEMA_FAILED',
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
    });
  }
  return `"${name}"`;
}

export function columnSqlType(column: ColumnDefinition): string {
  if (isGeometryColumn(column)) {
    return `geometry(${column.geometry}, ${column.srid})`;
  }
  switch (column.type) {
    case 'text':
      return 'TEXT';
    case 'double':
      return 'DOUBLE PRECISION';
    case 'integer':
      return 'BIGINT';
  }
}

function columnSql(column: ColumnDefinition): string {
  const parts = [quoteIdentifier(column.name, 'column'), columnSqlType(column)];
  if (column.primaryKey) {
    parts.push('PRIMARY KEY');
  } else if (column.required) {
    parts.push('NOT NULL');
  }
  return parts.join(' ');
}

export function requiresPostgis(schema: TableSchema): boolean {
  return schema.columns.some(isGeometryColumn);
}

export const CREATE_POSTGIS_EXTENSION = 'CREATE EXTENSION IF NOT EXISTS postgis';

/**
 * Idempotent CREATE TABLE statement, one column per line
 */
export function createTableSql(schema: TableSchema): string {
  if (schema.columns.length === 0) {
    throw new LoadError({
      code: 'SCHEMA_FAILED',
      message: `Table "${schema.name}" declares no columns`,
    });
  }
  const keyed = schema.columns.filter((c) => c.primaryKey);
  if (keyed.length > 1) {
    throw new LoadError({
      code: 'SCHEMA_FAILED',
      message: `Table "${schema.name}" declares more than one primary key column`,
    });
  }

  const columns = schema.columns.map((c) => `  ${columnSql(c)}`).join(',\n');
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(schema.name, 'table')} (\n${columns}\n)`;
}
