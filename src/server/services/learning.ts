import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { LearningRecord, LearningStats, UserPhrase } from '../../shared/types.js';
import {
  createDatabase,
  openDatabaseFile,
  queryCount,
  queryRows,
  saveDatabaseAtomic,
  type SqlJsDatabase,
} from '../db.js';
import { describeError, EngineError } from '../errors.js';

export const DEFAULT_BOOST_PER_USE = 100;
export const DEFAULT_RECENCY_HALF_LIFE_MS = 7 * 24 * 60 * 60 * 1000;

export interface LearningOptions {
  boostPerUse?: number;
  recencyHalfLifeMs?: number;
  now?: () => number;
}

export interface LearningOpenResult {
  store: LearningStore;
  warning?: EngineError; // LearningPersistenceUnavailable
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS learning (
    context TEXT NOT NULL,
    text TEXT NOT NULL,
    use_count INTEGER NOT NULL DEFAULT 1,
    last_used INTEGER NOT NULL,
    PRIMARY KEY (context, text)
  );
  CREATE TABLE IF NOT EXISTS user_phrases (
    zhuyin TEXT NOT NULL,
    text TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    PRIMARY KEY (zhuyin, text)
  );
`;

function unavailable(message: string, cause?: unknown): EngineError {
  return new EngineError('LearningPersistenceUnavailable', message, { cause });
}

function rowToRecord(row: Record<string, unknown>): LearningRecord {
  return {
    contextKey: typeof row.context === 'string' ? row.context : '',
    text: typeof row.text === 'string' ? row.text : '',
    useCount: typeof row.use_count === 'number' ? row.use_count : 0,
    lastUsed: typeof row.last_used === 'number' ? row.last_used : 0,
  };
}

function rowToPhrase(row: Record<string, unknown>): UserPhrase {
  return {
    zhuyin: typeof row.zhuyin === 'string' ? row.zhuyin : '',
    text: typeof row.text === 'string' ? row.text : '',
    createdAt: typeof row.created_at === 'number' ? row.created_at : 0,
  };
}

export interface PhraseChange {
  changed: boolean;
  warning?: EngineError;
}

/**
 * Per-user selection history: (context, text) -> use count and last use, plus the
 * phrases the user added.
 *
 * Lives in its own file, apart from the dictionary. Each record() is one upsert
 * followed by an atomic file replace. When the file cannot be written the store keeps
 * working in memory for the rest of the session.
 */
export class LearningStore {
  private readonly boostPerUse: number;
  private readonly halfLifeMs: number;
  private readonly now: () => number;
  private filePath: string | null;

  constructor(
    private readonly db: SqlJsDatabase,
    filePath: string | null,
    options: LearningOptions = {}
  ) {
    this.filePath = filePath;
    this.boostPerUse = options.boostPerUse ?? DEFAULT_BOOST_PER_USE;
    this.halfLifeMs = options.recencyHalfLifeMs ?? DEFAULT_RECENCY_HALF_LIFE_MS;
    this.now = options.now ?? Date.now;
    db.exec(SCHEMA);
  }

  get persistent(): boolean {
    return this.filePath !== null;
  }

  /**
   * Count one selection of `text` under `contextKey`. Returns a warning when the
   * selection could not be persisted; it is kept in memory either way.
   */
  record(contextKey: string, text: string): EngineError | undefined {
    this.db.run(
      `
        INSERT INTO learning (context, text, use_count, last_used)
        VALUES (?, ?, 1, ?) ON CONFLICT(context, text) DO
        UPDATE SET
            use_count = learning.use_count + 1,
            last_used = excluded.last_used
      `,
      [contextKey, text, this.now()]
    );
    return this.persist();
  }

  get(contextKey: string, text: string): LearningRecord | undefined {
    const [record] = queryRows(
      this.db,
      'SELECT * FROM learning WHERE context = ? AND text = ?',
      [contextKey, text],
      rowToRecord
    );
    return record;
  }

  /**
   * Additive score per text for one context: grows with use count and with recency.
   */
  boost(contextKey: string): Map<string, number> {
    const now = this.now();
    const result = new Map<string, number>();
    for (const record of queryRows(
      this.db,
      'SELECT * FROM learning WHERE context = ?',
      [contextKey],
      rowToRecord
    )) {
      result.set(record.text, this.score(record, now));
    }
    return result;
  }

  score(record: LearningRecord, now: number = this.now()): number {
    const age = Math.max(0, now - record.lastUsed);
    const recency = 0.5 + 0.5 * Math.pow(0.5, age / this.halfLifeMs);
    return this.boostPerUse * record.useCount * recency;
  }

  stats(): LearningStats {
    return {
      totalSelections: queryCount(this.db, 'SELECT COALESCE(SUM(use_count), 0) as cnt FROM learning', []),
      uniqueTexts: queryCount(this.db, 'SELECT COUNT(DISTINCT text) as cnt FROM learning', []),
      uniqueContexts: queryCount(this.db, 'SELECT COUNT(DISTINCT context) as cnt FROM learning', []),
      userPhrases: queryCount(this.db, 'SELECT COUNT(*) as cnt FROM user_phrases', []),
      persistent: this.persistent,
    };
  }

  exportRecords(): LearningRecord[] {
    return queryRows(
      this.db,
      'SELECT * FROM learning ORDER BY context ASC, use_count DESC, text ASC',
      [],
      rowToRecord
    );
  }

  /**
   * Merge adds counts and keeps the later timestamp; replace drops existing history first.
   */
  importRecords(records: LearningRecord[], options: { merge: boolean }): EngineError | undefined {
    if (!options.merge) {
      this.db.run('DELETE FROM learning');
    }
    for (const record of records) {
      this.db.run(
        `
          INSERT INTO learning (context, text, use_count, last_used)
          VALUES (?, ?, ?, ?) ON CONFLICT(context, text) DO
          UPDATE SET
              use_count = learning.use_count + excluded.use_count,
              last_used = MAX(learning.last_used, excluded.last_used)
        `,
        [record.contextKey, record.text, record.useCount, record.lastUsed]
      );
    }
    return this.persist();
  }

  /**
   * Add a user phrase. `zhuyin` is the glyph form; callers validate it first.
   */
  addPhrase(zhuyin: string, text: string): PhraseChange {
    this.db.run('INSERT OR IGNORE INTO user_phrases (zhuyin, text, created_at) VALUES (?, ?, ?)', [
      zhuyin,
      text,
      this.now(),
    ]);
    if (this.db.getRowsModified() === 0) {
      return { changed: false };
    }
    return { changed: true, warning: this.persist() };
  }

  removePhrase(zhuyin: string, text: string): PhraseChange {
    this.db.run('DELETE FROM user_phrases WHERE zhuyin = ? AND text = ?', [zhuyin, text]);
    if (this.db.getRowsModified() === 0) {
      return { changed: false };
    }
    return { changed: true, warning: this.persist() };
  }

  phrases(): UserPhrase[] {
    return queryRows(
      this.db,
      'SELECT * FROM user_phrases ORDER BY created_at ASC, zhuyin ASC, text ASC',
      [],
      rowToPhrase
    );
  }

  /**
   * Forget selection history. User phrases stay.
   */
  clear(): EngineError | undefined {
    this.db.run('DELETE FROM learning');
    return this.persist();
  }

  close(): void {
    this.db.close();
  }

  private persist(): EngineError | undefined {
    if (this.filePath === null) return undefined;
    try {
      saveDatabaseAtomic(this.db, this.filePath);
      return undefined;
    } catch (error) {
      const warning = unavailable(
        `Cannot write learning store at ${this.filePath}: ${describeError(error)}`,
        error
      );
      console.warn(`[learning] ${warning.message}; keeping selections in memory only`);
      this.filePath = null;
      return warning;
    }
  }
}

function ensureWritable(filePath: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  fs.accessSync(dir, fs.constants.W_OK);
  if (fs.existsSync(filePath)) {
    fs.accessSync(filePath, fs.constants.R_OK | fs.constants.W_OK);
  }
}

async function openExisting(filePath: string): Promise<SqlJsDatabase | null> {
  if (!fs.existsSync(filePath)) return null;
  let db: SqlJsDatabase | undefined;
  try {
    db = await openDatabaseFile(filePath);
    // sql.js only notices a bad file on first use
    db.exec('SELECT count(*) FROM sqlite_master');
    return db;
  } catch (error) {
    db?.close();
    const aside = `${filePath}.corrupt-${Date.now()}`;
    fs.renameSync(filePath, aside);
    console.warn(`[learning] Unreadable learning store moved to ${aside}: ${describeError(error)}`);
    return null;
  }
}

// History from a file that can be read but not written, kept in memory only
async function readOnlyCopy(filePath: string): Promise<SqlJsDatabase | null> {
  if (!fs.existsSync(filePath)) return null;
  let db: SqlJsDatabase | undefined;
  try {
    db = await openDatabaseFile(filePath);
    db.exec('SELECT count(*) FROM sqlite_master');
    return db;
  } catch (error) {
    db?.close();
    console.warn(`[learning] Cannot read ${filePath}: ${describeError(error)}`);
    return null;
  }
}

/**
 * Open the learning store at `filePath`, or an in-memory store when `filePath` is
 * null. A location that cannot be written yields an in-memory store plus a
 * LearningPersistenceUnavailable warning.
 */
export async function openLearningStore(
  filePath: string | null,
  options: LearningOptions = {}
): Promise<LearningOpenResult> {
  if (filePath === null) {
    return { store: new LearningStore(await createDatabase(), null, options) };
  }

  try {
    ensureWritable(filePath);
  } catch (error) {
    const warning = unavailable(
      `Learning store location ${filePath} is not writable: ${describeError(error)}`,
      error
    );
    console.warn(`[learning] ${warning.message}; learning will not survive this session`);
    const existing = await readOnlyCopy(filePath);
    return { store: new LearningStore(existing ?? (await createDatabase()), null, options), warning };
  }

  const db = (await openExisting(filePath)) ?? (await createDatabase());
  const store = new LearningStore(db, filePath, options);
  const stats = store.stats();
  console.log(`[learning] Opened ${filePath} (${stats.totalSelections} selections recorded)`);
  return { store };
}

const recordsSchema = z.array(
  z.object({
    contextKey: z.string(),
    text: z.string().min(1),
    useCount: z.number().int().positive(),
    lastUsed: z.number().int().nonnegative(),
  })
);

/**
 * Validate records read from an export file.
 */
export function parseRecords(data: unknown): LearningRecord[] {
  const parsed = recordsSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid learning records: ${parsed.error.message}`);
  }
  return parsed.data;
}
