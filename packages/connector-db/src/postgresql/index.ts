/**
 * PostgreSQL Loader
 *
 * Exports for loading records into PostgreSQL/PostGIS.
 */

export { PostgresClient } from './client.js';
export type { PostgresClientConfig, PostgresQueryResult } from './client.js';

export {
  CREATE_POSTGIS_EXTENSION,
  createTableSql,
  columnSqlType,
  quoteIdentifier,
  requiresPostgis,
} from './ddl.js';

export { buildInsertStatement, chunk, effectiveBatchSize, MAX_BIND_PARAMETERS } from './insert.js';
export type { InsertStatement } from './insert.js';

export { PostgresLoader, createPostgresLoader, DEFAULT_BATCH_SIZE } from './loader.js';
export type { PostgresLoaderConfig } from './loader.js';
