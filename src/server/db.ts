import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic, type SqlValue } from 'sql.js';
import fs from 'fs';
import path from 'path';

let sqlPromise: Promise<SqlJsStatic> | null = null;

export type { SqlJsDatabase, SqlValue };

export type Row = Record<string, SqlValue>;

export function getSql(): Promise<SqlJsStatic> {
  if (!sqlPromise) {
    sqlPromise = initSqlJs();
  }
  return sqlPromise;
}

/**
 * Read a database file into memory. The file itself is never written through this
 * handle, so it may sit on a read-only mount.
 */
export async function openDatabaseFile(filePath: string): Promise<SqlJsDatabase> {
  const SQL = await getSql();
  const buffer = fs.readFileSync(filePath);
  return new SQL.Database(buffer);
}

export async function createDatabase(): Promise<SqlJsDatabase> {
  const SQL = await getSql();
  return new SQL.Database();
}

/**
 * Write the database next to its target, then rename it over the target so a reader
 * sees either the old file or the new one.
 */
export function saveDatabaseAtomic(db: SqlJsDatabase, filePath: string): void {
  const data = db.export();
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );
  try {
    fs.writeFileSync(tmpPath, Buffer.from(data));
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw error;
  }
}

export function queryRows<T>(
  db: SqlJsDatabase,
  sql: string,
  params: SqlValue[],
  mapRow: (row: Row) => T
): T[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const result: T[] = [];
    while (stmt.step()) {
      result.push(mapRow(stmt.getAsObject()));
    }
    return result;
  } finally {
    stmt.free();
  }
}

export function queryCount(db: SqlJsDatabase, sql: string, params: SqlValue[]): number {
  const [count] = queryRows(db, sql, params, (row) => Number(row.cnt ?? 0));
  return count ?? 0;
}

export function asString(value: SqlValue | undefined): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

export function asNumber(value: SqlValue | undefined): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}
