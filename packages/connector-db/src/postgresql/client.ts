/**
 * PostgreSQL Client
 *
 * Wrapper around a single pg.Client: one connection per run, no pool.
 */

import pg from 'pg';
import type { Client as PgClient, QueryResultRow } from 'pg';
import { LoadError, silentLogger, type ErrorCode, type StageLogger } from '@geosync/core';

const { Client } = pg;

export interface PostgresClientConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connect timeout in milliseconds (default: 10000) */
  connectionTimeoutMs?: number;
}

export interface PostgresQueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

export class PostgresClient {
  private readonly config: PostgresClientConfig;
  private readonly logger: StageLogger;
  private client: PgClient | null = null;

  constructor(config: PostgresClientConfig, logger: StageLogger = silentLogger) {
    this.config = config;
    this.logger = logger;
  }

  get connected(): boolean {
    return this.client !== null;
  }

  /**
   * Open the connection
   */
  async connect(): Promise<void> {
    if (this.client) return;

    const client = new Client({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      ssl: this.config.ssl,
      connectionTimeoutMillis: this.config.connectionTimeoutMs ?? 10_000,
    });

    // Emitted when the server drops the connection; a pending query rejects separately
    client.on('error', (error) => {
      if (this.client === client) this.client = null;
      this.logger.warn('PostgreSQL connection lost', { error: error.message });
    });

    try {
      await client.connect();
    } catch (error) {
      throw new LoadError({
        code: 'CONNECTION_FAILED',
        message: `PostgreSQL connection failed: ${error instanceof Error ? error.message : String(error)}`,
        suggestion: 'Check DB_HOST, DB_PORT, DB_NAME, DB_USER and DB_PASSWORD.',
        cause: error,
        context: { host: this.config.host, port: this.config.port, database: this.config.database },
      });
    }

    this.client = client;
  }

  /**
   * Close the connection
   */
  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.end();
    }
  }

  /**
   * Execute a query
   */
  async query<T extends QueryResultRow = Record<string, unknown>>(
    sql: string,
    params?: unknown[],
    failureCode: ErrorCode = 'WRITE_FAILED'
  ): Promise<PostgresQueryResult<T>> {
    const client = this.requireClient();
    try {
      const result = await client.query<T>(sql, params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    } catch (error) {
      throw new LoadError({
        code: failureCode,
        message: `Query failed: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }
  }

  /**
   * Run fn inside BEGIN/COMMIT, rolling back if it throws
   */
  async withTransaction<T>(fn: () => Promise<T>): Promise<T> {
    await this.query('BEGIN');
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      await this.rollback(error);
      throw error;
    }
    await this.query('COMMIT');
    return result;
  }

  private async rollback(original: unknown): Promise<void> {
    // A dropped connection aborts the transaction server-side
    if (!this.client) return;
    try {
      await this.query('ROLLBACK');
    } catch (rollbackError) {
      throw new LoadError({
        code: 'WRITE_FAILED',
        message: `Rollback failed after: ${original instanceof Error ? original.message : String(original)}`,
        cause: original,
        context: {
          rollbackError: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        },
      });
    }
  }

  private requireClient(): PgClient {
    if (!this.client) {
      throw new LoadError({
        code: 'CONNECTION_FAILED',
        message: 'PostgreSQL client is not connected',
        suggestion: 'Call connect() before performing operations.',
      });
    }
    return this.client;
  }
}
