/**
 * Field Mapping Types
 *
 * Build-time description of how raw source fields become table columns.
 */

import type { RawRecord, TableSchema } from '@geosync/core';

/** Built-in coercions from raw values to column storage values */
export type FieldCoercion =
  | 'text'
  | 'number'
  | 'integer'
  /** Two sources, [lon, lat], to WKT POINT */
  | 'pointWkt'
  /** Array of {lat, lon} to WKT LINESTRING */
  | 'lineStringWkt';

/** Single field mapping definition */
export interface FieldMapping {
  /** Column name in the destination table */
  target: string;
  /** Dot path(s) into the raw record ("tags.highway"); pointWkt takes [lon, lat] */
  source: string | readonly string[];
  /** Coercion applied to the source value(s) */
  coerce: FieldCoercion;
  /** Value to coerce instead when the source is absent */
  fallback?: (record: RawRecord) => unknown;
}

/** A destination table together with the mappings that fill it */
export interface Dataset {
  name: string;
  table: TableSchema;
  fields: readonly FieldMapping[];
}
