/**
 * In-process stand-in for the `pg` module.
 *
 * Understands exactly the statements the loader issues: CREATE EXTENSION,
 * CREATE TABLE IF NOT EXISTS, multi-row INSERT (with ON CONFLICT DO
 * NOTHING) and BEGIN/COMMIT/ROLLBACK. A dropped connection is simulated
 * the way pg reports it: the query rejects and the client emits 'error'.
 * Tests install it with
 *
 *   vi.mock('pg', async () => (await import('./support/fake-pg.js')).createFakePgModule());
 */

import { EventEmitter } from 'node:events';

export interface RecordedStatement {
  sql: string;
  params: unknown[];
}

interface FakeTable {
  name: string;
  ddl: string;
  columns: string[];
  primaryKey: string | null;
  rows: unknown[][];
}

interface PendingInsert {
  table: FakeTable;
  row: unknown[];
}

const CREATE_TABLE = /^CREATE TABLE (IF NOT EXISTS )?"(\w+)" \(\n([\s\S]*)\n\)$/;
const COLUMN_LINE = /^\s+"(\w+)" ([^\n]*?),?$/gm;
const INSERT = /^INSERT INTO "(\w+)" \(([^)]*)\) VALUES /;

export class FakeDatabase {
  readonly tables = new Map<string, FakeTable>();
  readonly extensions = new Set<string>();
  readonly statements: RecordedStatement[] = [];
  connectError: Error | null = null;
  /** Makes matching statements throw, as a rejected statement would */
  failWhen: ((sql: string, params: unknown[]) => boolean) | null = null;
  /** Makes the connection drop while a matching statement runs */
  dropConnectionWhen: ((sql: string) => boolean) | null = null;
  openClients = 0;

  reset(): void {
    this.tables.clear();
    this.extensions.clear();
    this.statements.length = 0;
    this.connectError = null;
    this.failWhen = null;
    this.dropConnectionWhen = null;
    this.openClients = 0;
  }

  /** Committed rows of a table, keyed by column name */
  rows(tableName: string): Record<string, unknown>[] {
    const table = this.tables.get(tableName);
    if (!table) return [];
    return table.rows.map((row) =>
      Object.fromEntries(table.columns.map((column, i) => [column, row[i]]))
    );
  }

  statementsMatching(pattern: RegExp): RecordedStatement[] {
    return this.statements.filter((s) => pattern.test(s.sql));
  }

  execute(sql: string, params: unknown[], pending: PendingInsert[] | null): { rows: unknown[]; rowCount: number } {
    this.statements.push({ sql, params });

    if (this.failWhen?.(sql, params)) {
      throw new Error(`simulated failure for: ${sql.split('\n')[0]}`);
    }

    const extension = /^CREATE EXTENSION IF NOT EXISTS (\w+)$/.exec(sql);
    if (extension?.[1]) {
      this.extensions.add(extension[1]);
      return { rows: [], rowCount: 0 };
    }

    const create = CREATE_TABLE.exec(sql);
    if (create) {
      return this.createTable(sql, create[1] !== undefined, create[2] ?? '', create[3] ?? '');
    }

    const insert = INSERT.exec(sql);
    if (insert) {
      return this.insert(sql, insert[1] ?? '', insert[2] ?? '', params, pending);
    }

    throw new Error(`fake pg does not understand: ${sql}`);
  }

  commit(pending: PendingInsert[]): void {
    for (const { table, row } of pending) {
      table.rows.push(row);
    }
  }

  private createTable(sql: string, ifNotExists: boolean, name: string, body: string) {
    if (this.tables.has(name)) {
      if (ifNotExists) return { rows: [], rowCount: 0 };
      throw new Error(`relation "${name}" already exists`);
    }

    const columns: string[] = [];
    let primaryKey: string | null = null;
    for (const match of body.matchAll(COLUMN_LINE)) {
      const column = match[1] ?? '';
      columns.push(column);
      if (match[2]?.includes('PRIMARY KEY')) primaryKey = column;
    }

    this.tables.set(name, { name, ddl: sql, columns, primaryKey, rows: [] });
    return { rows: [], rowCount: 0 };
  }

  private insert(
    sql: string,
    name: string,
    columnList: string,
    params: unknown[],
    pending: PendingInsert[] | null
  ) {
    const table = this.tables.get(name);
    if (!table) throw new Error(`relation "${name}" does not exist`);

    const columns = columnList.split(',').map((c) => c.trim().replace(/"/g, ''));
    const keyIndex = table.primaryKey ? columns.indexOf(table.primaryKey) : -1;
    const onConflictDoNothing = sql.includes('ON CONFLICT');

    const staged = pending ?? [];
    const existingKeys = new Set<unknown>();
    if (keyIndex >= 0) {
      for (const row of table.rows) existingKeys.add(row[keyIndex]);
      for (const p of staged) if (p.table === table) existingKeys.add(p.row[keyIndex]);
    }

    let inserted = 0;
    for (let i = 0; i < params.length; i += columns.length) {
      const values = params.slice(i, i + columns.length);
      const row = table.columns.map((column) => {
        const index = columns.indexOf(column);
        return index >= 0 ? values[index] : null;
      });

      if (keyIndex >= 0) {
        const key = values[keyIndex];
        if (existingKeys.has(key)) {
          if (onConflictDoNothing) continue;
          throw new Error(`duplicate key value violates unique constraint "${name}_pkey"`);
        }
        existingKeys.add(key);
      }

      staged.push({ table, row });
      inserted++;
    }

    if (!pending) this.commit(staged);
    return { rows: [], rowCount: inserted };
  }
}

export const fakeDatabase = new FakeDatabase();

export class FakeClient extends EventEmitter {
  readonly config: Record<string, unknown>;
  private pending: PendingInsert[] | null = null;
  private open = false;

  constructor(config: Record<string, unknown> = {}) {
    super();
    this.config = config;
  }

  async connect(): Promise<void> {
    if (fakeDatabase.connectError) throw fakeDatabase.connectError;
    this.open = true;
    fakeDatabase.openClients++;
  }

  async query(sql: string, params: unknown[] = []): Promise<{ rows: unknown[]; rowCount: number }> {
    if (!this.open) throw new Error('Client is not connected');

    if (fakeDatabase.dropConnectionWhen?.(sql)) {
      fakeDatabase.statements.push({ sql, params });
      return this.dropConnection();
    }

    if (sql === 'BEGIN') {
      fakeDatabase.statements.push({ sql, params });
      this.pending = [];
      return { rows: [], rowCount: 0 };
    }
    if (sql === 'COMMIT') {
      fakeDatabase.statements.push({ sql, params });
      if (this.pending) fakeDatabase.commit(this.pending);
      this.pending = null;
      return { rows: [], rowCount: 0 };
    }
    if (sql === 'ROLLBACK') {
      fakeDatabase.statements.push({ sql, params });
      this.pending = null;
      return { rows: [], rowCount: 0 };
    }

    return fakeDatabase.execute(sql, params, this.pending);
  }

  /** Rejects the active query, then emits 'error' from the socket's own tick, as pg does */
  private dropConnection(): Promise<never> {
    const error = new Error('Connection terminated unexpectedly');
    return new Promise<never>((_resolve, reject) => {
      setImmediate(() => {
        this.open = false;
        this.pending = null;
        fakeDatabase.openClients--;
        reject(error);
        this.emit('error', error);
      });
    });
  }

  async end(): Promise<void> {
    if (this.open) fakeDatabase.openClients--;
    this.open = false;
  }
}

export function createFakePgModule() {
  return { default: { Client: FakeClient }, Client: FakeClient };
}
