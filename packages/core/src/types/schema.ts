/**
 * Destination table declarations.
 *
 * Tables are declared at build time; nothing here is read from the
 * database or from configuration.
 */

export type ScalarColumnType = 'text' | 'double' | 'integer';

export type GeometryKind = 'Point' | 'LineString';

interface BaseColumn {
  name: string;
  /** Records with a null value for this column are excluded from the load */
  required: boolean;
  primaryKey?: boolean;
}

export interface ScalarColumn extends BaseColumn {
  type: ScalarColumnType;
}

export interface GeometryColumn extends BaseColumn {
  type: 'geometry';
  geometry: GeometryKind;
  /** Spatial reference id, 4326 for WGS 84 lon/lat */
  srid: number;
}

export type ColumnDefinition = ScalarColumn | GeometryColumn;

export type ColumnType = ColumnDefinition['type'];

export interface TableSchema {
  /** Table name (unqualified, public schema) */
  name: string;
  columns: ColumnDefinition[];
}

export function isGeometryColumn(column: ColumnDefinition): column is GeometryColumn {
  return column.type === 'geometry';
}

/**
 * Name of the primary key column, if the table declares one
 */
export function primaryKeyOf(schema: TableSchema): string | undefined {
  return schema.columns.find((c) => c.primaryKey)?.name;
}
