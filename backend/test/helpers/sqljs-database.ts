import initSqlJs, { type SqlJsStatic, type SqlValue } from 'sql.js';
import type { SqliteDatabase, SqliteStatement } from 'kysely';

/**
 * WHY:
 * - Kysely's SqliteDialect takes any database with the better-sqlite3 shape
 *   (prepare -> statement with reader/all/run/iterate).
 * - sql.js is SQLite compiled to WASM and ships inside its npm package, so
 *   tests need no native build.
 *
 * RULES:
 * - One fresh statement per call; every statement is freed before returning.
 */

type SqlJsDatabase = InstanceType<SqlJsStatic['Database']>;

let sqlJs: Promise<SqlJsStatic> | undefined;

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Uint8Array) return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function lastInsertRowid(db: SqlJsDatabase): number {
  const [result] = db.exec('SELECT last_insert_rowid()');
  const value = result?.values[0]?.[0];
  return typeof value === 'number' ? value : 0;
}

function returnsRows(db: SqlJsDatabase, sql: string): boolean {
  const stmt = db.prepare(sql);
  try {
    return stmt.getColumnNames().length > 0;
  } finally {
    stmt.free();
  }
}

class SqlJsStatement implements SqliteStatement {
  readonly reader: boolean;

  constructor(
    private readonly db: SqlJsDatabase,
    private readonly sql: string,
  ) {
    this.reader = returnsRows(db, sql);
  }

  all(parameters: ReadonlyArray<unknown>): unknown[] {
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.bind(parameters.map(toSqlValue));
      const rows: unknown[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  run(parameters: ReadonlyArray<unknown>): { changes: number; lastInsertRowid: number } {
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.run(parameters.map(toSqlValue));
    } finally {
      stmt.free();
    }

    return { changes: this.db.getRowsModified(), lastInsertRowid: lastInsertRowid(this.db) };
  }

  *iterate(parameters: ReadonlyArray<unknown>): IterableIterator<unknown> {
    yield* this.all(parameters);
  }
}

export async function openSqlJsDatabase(): Promise<SqliteDatabase> {
  sqlJs ??= initSqlJs();
  const SQL = await sqlJs;
  const db = new SQL.Database();

  return {
    prepare: (sql: string) => new SqlJsStatement(db, sql),
    close: () => db.close(),
  };
}
