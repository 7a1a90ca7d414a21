/**
 * PostgreSQL Loader
 *
 * Implements ILoader: ensures the destination table exists, then inserts
 * every record in chunked multi-row statements inside one transaction.
 */

import {
  LoadError,
  silentLogger,
  type ILoader,
  type LoadResult,
  type StageLogger,
  type TableSchema,
  type TransformedRecord,
} from '@geosync/core';
import { PostgresClient, type PostgresClientConfig } from './client.js';
import { CREATE_POSTGIS_EXTENSION, createTableSql, requiresPostgis } from './ddl.js';
import { buildInsertStatement, chunk, effectiveBatchSize } from './insert.js';

export interface PostgresLoaderConfig extends PostgresClientConfig {
  /** Rows per INSERT statement (default: 500) */
  batchSize?: number;
}

export const DEFAULT_BATCH_SIZE = 500;

export class PostgresLoader implements ILoader {
  readonly config: PostgresLoaderConfig;
  readonly schema: TableSchema;
  private readonly client: PostgresClient;
  private readonly logger: StageLogger;

  constructor(
    config: PostgresLoaderConfig,
    schema: TableSchema,
    logger: StageLogger = silentLogger,
    client?: PostgresClient
  ) {
    this.config = config;
    this.schema = schema;
    this.logger = logger;
    this.client = client ?? new PostgresClient(config, logger);
  }

  async connect(): Promise<void> {
    await this.client.connect();
    this.logger.debug('Connected to PostgreSQL', {
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
    });
  }

  async close(): Promise<void> {
    await this.client.disconnect();
  }

  /**
   * Create the destination table (and PostGIS) if absent. Safe to repeat.
   */
  async ensureTable(): Promise<void> {
    this.ensureConnected();

    if (requiresPostgis(this.schema)) {
      await this.client.query(CREATE_POSTGIS_EXTENSION, undefined, 'SCHEMA_FAILED');
    }
    await this.client.query(createTableSql(this.schema), undefined, 'SCHEMA_FAILED');

    this.logger.info('Ensured table exists', { table: this.schema.name });
  }

  async load(records: TransformedRecord[]): Promise<LoadResult> {
    await this.ensureTable();

    if (records.length === 0) {
      this.logger.info('No records to load', { table: this.schema.name });
      return { attempted: 0, inserted: 0, batches: 0 };
    }

    const size = effectiveBatchSize(this.schema, this.config.batchSize ?? DEFAULT_BATCH_SIZE);
    const batches = chunk(records, size);

    const inserted = await this.client.withTransaction(async () => {
      let total = 0;
      for (const [index, batch] of batches.entries()) {
        const statement = buildInsertStatement(this.schema, batch);
        const result = await this.client.query(statement.text, statement.values, 'WRITE_FAILED');
        total += result.rowCount;
        this.logger.debug('Inserted batch', {
          table: this.schema.name,
          batch: index + 1,
          batches: batches.length,
          rows: batch.length,
          inserted: result.rowCount,
        });
      }
      return total;
    });

    const skipped = records.length - inserted;
    this.logger.info('Loaded records', {
      table: this.schema.name,
      attempted: records.length,
      inserted,
      skipped: skipped > 0 ? skipped : undefined,
    });

    return { attempted: records.length, inserted, batches: batches.length };
  }

  private ensureConnected(): void {
    if (!this.client.connected) {
      throw new LoadError({
        code: 'CONNECTION_FAILED',
        message: 'Loader is not connected',
        suggestion: 'Call connect() before loading.',
      });
    }
  }
}

/**
 * Factory function to create a PostgreSQL loader
 */
export function createPostgresLoader(
  config: PostgresLoaderConfig,
  schema: TableSchema,
  logger?: StageLogger
): PostgresLoader {
  return new PostgresLoader(config, schema, logger);
}
