/**
 * Stage interfaces
 *
 * The pipeline only talks to its collaborators through these, so the
 * HTTP source and the database can be swapped for in-memory stand-ins.
 */

import type { LoadResult, RawRecord, TransformedRecord } from '../types/index.js';

export interface IExtractor {
  /**
   * Retrieve the raw record collection
   * @throws FetchError once retries are exhausted or on a terminal failure
   */
  extract(): Promise<RawRecord[]>;
}

export interface ILoader {
  /**
   * Open the database connection for this run
   * @throws LoadError if the connection cannot be established
   */
  connect(): Promise<void>;

  /**
   * Ensure the destination table exists, then insert all records.
   * Either every batch lands or none does.
   * @throws LoadError if any statement is rejected
   */
  load(records: TransformedRecord[]): Promise<LoadResult>;

  /**
   * Close the connection. Safe to call when never connected.
   */
  close(): Promise<void>;
}
