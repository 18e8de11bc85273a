import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger';

const logger = createLogger('sqlite');

export interface SqliteStatement {
  run: (...args: unknown[]) => unknown;
  get: (...args: unknown[]) => unknown;
  all: (...args: unknown[]) => unknown[];
}

export interface SqliteDatabase {
  exec: (sql: string) => void;
  query: (sql: string) => SqliteStatement;
  transaction: (callback: () => void) => () => void;
  close: () => void;
}

/** Opens (and creates) a database file; `:memory:` gives a private in-process database. */
export function openSqliteDatabase(file: string): SqliteDatabase {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  }
  const db = new Database(file);
  if (file !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  const statements = new Map<string, Database.Statement>();
  const prepare = (sql: string): Database.Statement => {
    const cached = statements.get(sql);
    if (cached) return cached;
    const statement = db.prepare(sql);
    statements.set(sql, statement);
    return statement;
  };
  return {
    exec(sql: string) {
      db.exec(sql);
    },
    query(sql: string): SqliteStatement {
      return {
        run: (...args: unknown[]) => prepare(sql).run(...args),
        get: (...args: unknown[]) => prepare(sql).get(...args),
        all: (...args: unknown[]) => prepare(sql).all(...args),
      };
    },
    transaction(callback: () => void): () => void {
      const wrapped = db.transaction(callback);
      return () => {
        wrapped();
      };
    },
    close() {
      statements.clear();
      db.close();
    },
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function readString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : '';
}

export function readNumber(row: Record<string, unknown>, key: string): number {
  const value = row[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return 0;
}

/** Reads an enum column; an unknown value is logged and read as `fallback`. */
export function readEnum<T extends string>(
  row: Record<string, unknown>,
  key: string,
  values: readonly T[],
  fallback: T,
): T {
  const value = row[key];
  const known = values.find((candidate) => candidate === value);
  if (known !== undefined) return known;
  logger.warn('unknown value in enum column', { column: key, id: row.id, value, read_as: fallback });
  return fallback;
}

export function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && /UNIQUE constraint failed/i.test(error.message);
}

export function changes(result: unknown): number {
  return isRecord(result) ? readNumber(result, 'changes') : 0;
}

/** JSON stored in a TEXT column; unreadable content reads as absent. */
export function parseJsonColumn(raw: string): unknown {
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/** Named parameters as statement arguments; an empty set binds nothing. */
export function namedArgs(params: Record<string, string | number>): unknown[] {
  return Object.keys(params).length > 0 ? [params] : [];
}
