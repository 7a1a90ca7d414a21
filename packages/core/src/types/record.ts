/**
 * Record types for data moving through a sync run
 */

/** A record exactly as decoded from the source payload */
export type RawRecord = {
  [field: string]: unknown;
};

/** Storage value of a single column. Geometry columns carry WKT text. */
export type ColumnValue = string | number | null;

/** A record restricted to the destination table's columns */
export type TransformedRecord = {
  [column: string]: ColumnValue;
};

/** Result of a load operation */
export interface LoadResult {
  /** Number of records handed to the loader */
  attempted: number;
  /** Rows the database reported as inserted (conflicting ids are skipped) */
  inserted: number;
  /** Number of INSERT statements issued */
  batches: number;
}
