import fs from 'fs';
import type {
  DictionaryEntry,
  DictionaryHit,
  DictionaryStats,
  PartialSyllable,
  Syllable,
} from '../../shared/types.js';
import {
  asNumber,
  asString,
  createDatabase,
  openDatabaseFile,
  queryRows,
  type SqlJsDatabase,
} from '../db.js';
import { describeError, EngineError } from '../errors.js';
import type { Alphabet } from './alphabet.js';
import { partialPrefixes, sequenceKey, tonelessKey } from './zhuyin.js';

export const SCHEMA_VERSION = '1';
export const DEFAULT_FREQUENCY = 100;

export interface DictionarySourceRow {
  text: string;
  zhuyin: string; // glyphs, syllables separated by spaces
  frequency: number;
}

export interface LookupOptions {
  fuzzyTone: boolean;
}

export interface PrefixLookupOptions extends LookupOptions {
  limit?: number;
}

interface TrieNode {
  syllable?: PartialSyllable; // toneless syllable leading to this node
  children: Map<string, TrieNode>;
  entries: DictionaryEntry[];
}

function createNode(syllable?: PartialSyllable): TrieNode {
  return { syllable, children: new Map(), entries: [] };
}

function compareEntries(a: DictionaryEntry, b: DictionaryEntry): number {
  return b.frequency - a.frequency || a.order - b.order;
}

function fail(message: string, cause?: unknown): never {
  throw new EngineError('DictionaryLoadFailure', message, { cause });
}

/**
 * Read-only lookup over dictionary entries keyed by syllable sequences.
 *
 * Entries live in a trie keyed by toneless syllables so exact, tone-insensitive and
 * partial-syllable queries share one walk. Built once; nothing mutates it afterwards.
 */
export class DictionaryStore {
  private readonly root = createNode();
  private readonly exact = new Map<string, DictionaryEntry[]>();
  private readonly byFirstChar = new Map<string, DictionaryEntry[]>();
  private readonly entries: readonly DictionaryEntry[];

  constructor(entries: DictionaryEntry[], readonly version: string) {
    this.entries = Object.freeze([...entries]);

    for (const entry of this.entries) {
      Object.freeze(entry);
      let node = this.root;
      for (const syllable of entry.syllables) {
        const key = tonelessKey(syllable);
        let child = node.children.get(key);
        if (!child) {
          const { initial, medial, final } = syllable;
          child = createNode({ initial, medial, final });
          node.children.set(key, child);
        }
        node = child;
      }
      node.entries.push(entry);

      const list = this.exact.get(entry.key) ?? [];
      list.push(entry);
      this.exact.set(entry.key, list);

      if (entry.kind === 'phrase') {
        const first = [...entry.text][0];
        const phrases = this.byFirstChar.get(first) ?? [];
        phrases.push(entry);
        this.byFirstChar.set(first, phrases);
      }
    }

    const sortTree = (node: TrieNode): void => {
      node.entries.sort(compareEntries);
      node.children.forEach(sortTree);
    };
    sortTree(this.root);
    this.exact.forEach((list) => list.sort(compareEntries));
    this.byFirstChar.forEach((list) => list.sort(compareEntries));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Entries for a complete syllable sequence, highest frequency first.
   * With fuzzy tone, entries whose tones differ are included as `fuzzy` hits.
   */
  lookup(syllables: Syllable[], options: LookupOptions): DictionaryHit[] {
    if (syllables.length === 0) return [];
    const key = sequenceKey(syllables);

    if (!options.fuzzyTone) {
      return (this.exact.get(key) ?? []).map((entry): DictionaryHit => ({ entry, match: 'exact' }));
    }

    const node = this.walk(syllables);
    if (!node) return [];
    return node.entries.map((entry): DictionaryHit => ({
      entry,
      match: entry.key === key ? 'exact' : 'fuzzy',
    }));
  }

  /**
   * Entries that extend `completed` by at least one syllable whose leading symbols
   * are `partial`. Completed syllables must match tones exactly unless fuzzy tone is on.
   */
  lookupPrefix(completed: Syllable[], partial: PartialSyllable, options: PrefixLookupOptions): DictionaryHit[] {
    const base = completed.length > 0 ? this.walk(completed) : this.root;
    if (!base) return [];

    const found: DictionaryEntry[] = [];
    const collect = (node: TrieNode): void => {
      found.push(...node.entries);
      node.children.forEach(collect);
    };
    for (const child of base.children.values()) {
      if (child.syllable && partialPrefixes(partial, child.syllable)) {
        collect(child);
      }
    }

    const matching = options.fuzzyTone
      ? found
      : found.filter((entry) => completed.every((s, i) => entry.syllables[i].tone === s.tone));

    matching.sort(compareEntries);
    const limited = options.limit === undefined ? matching : matching.slice(0, options.limit);
    return limited.map((entry): DictionaryHit => ({ entry, match: 'prefix' }));
  }

  /**
   * Phrases beginning with `character`, for continuation after a commit.
   */
  associated(character: string, limit: number): DictionaryEntry[] {
    return (this.byFirstChar.get(character) ?? []).slice(0, limit);
  }

  stats(): DictionaryStats {
    const characters = this.entries.filter((e) => e.kind === 'character').length;
    return {
      version: this.version,
      total: this.entries.length,
      characters,
      phrases: this.entries.length - characters,
    };
  }

  private walk(syllables: Syllable[]): TrieNode | undefined {
    let node: TrieNode | undefined = this.root;
    for (const syllable of syllables) {
      node = node.children.get(tonelessKey(syllable));
      if (!node) return undefined;
    }
    return node;
  }
}

export function createEntry(
  text: string,
  syllables: Syllable[],
  frequency: number,
  order: number
): DictionaryEntry {
  return {
    key: sequenceKey(syllables),
    syllables,
    text,
    frequency,
    kind: [...text].length === 1 ? 'character' : 'phrase',
    order,
  };
}

function readMeta(db: SqlJsDatabase): Map<string, string> {
  const meta = new Map<string, string>();
  for (const [key, value] of queryRows(db, 'SELECT key, value FROM meta', [], (row) => [
    asString(row.key),
    asString(row.value),
  ])) {
    meta.set(key, value);
  }
  return meta;
}

/**
 * Load the dictionary artifact. Any problem is a DictionaryLoadFailure: without a
 * dictionary no candidate can ever be produced.
 */
export async function loadDictionary(filePath: string, alphabet: Alphabet): Promise<DictionaryStore> {
  if (!fs.existsSync(filePath)) {
    fail(`Dictionary not found at ${filePath}. Build it with "npm run build:dictionary".`);
  }

  let db: SqlJsDatabase;
  try {
    db = await openDatabaseFile(filePath);
  } catch (error) {
    fail(`Cannot read dictionary at ${filePath}: ${describeError(error)}`, error);
  }

  try {
    let meta: Map<string, string>;
    let rows: Array<{ id: number; zhuyin: string; phrase: string; frequency: number }>;
    try {
      meta = readMeta(db);
      rows = queryRows(
        db,
        'SELECT id, zhuyin, phrase, frequency FROM phrases ORDER BY id ASC',
        [],
        (row) => ({
          id: asNumber(row.id),
          zhuyin: asString(row.zhuyin),
          phrase: asString(row.phrase),
          frequency: asNumber(row.frequency),
        })
      );
    } catch (error) {
      fail(`Dictionary at ${filePath} is corrupt: ${describeError(error)}`, error);
    }

    const schemaVersion = meta.get('schema_version');
    if (schemaVersion !== SCHEMA_VERSION) {
      fail(`Dictionary at ${filePath} has schema version ${schemaVersion ?? '(none)'}, expected ${SCHEMA_VERSION}`);
    }

    const entries = rows.map((row, order) => {
      if (row.phrase === '') {
        fail(`Dictionary row ${row.id} has no text`);
      }
      if (!Number.isInteger(row.frequency) || row.frequency < 0) {
        fail(`Dictionary row ${row.id} (${row.phrase}) has invalid frequency ${row.frequency}`);
      }
      let syllables: Syllable[];
      try {
        syllables = alphabet.parseSequence(row.zhuyin);
      } catch (error) {
        fail(`Dictionary row ${row.id} (${row.phrase}) has invalid zhuyin: ${describeError(error)}`, error);
      }
      return createEntry(row.phrase, syllables, row.frequency, order);
    });

    if (entries.length === 0) {
      fail(`Dictionary at ${filePath} has no entries`);
    }

    const store = new DictionaryStore(entries, meta.get('dictionary_version') ?? 'unknown');
    console.log(`[dictionary] Loaded ${store.size} entries (version ${store.version}) from ${filePath}`);
    return store;
  } finally {
    db.close();
  }
}

/**
 * Parse TSV source lines: text<TAB>zhuyin<TAB>frequency. Frequency defaults to 100.
 */
export function parseDictionarySource(source: string): DictionarySourceRow[] {
  const rows: DictionarySourceRow[] = [];
  const lines = source.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/\r$/, '');
    if (line.trim() === '' || line.startsWith('#')) continue;

    const [text, zhuyin, frequencyRaw] = line.split('\t').map((part) => part.trim());
    if (!text || !zhuyin) {
      throw new Error(`Line ${i + 1}: expected "text<TAB>zhuyin[<TAB>frequency]"`);
    }
    const frequency = frequencyRaw ? Number(frequencyRaw) : DEFAULT_FREQUENCY;
    if (!Number.isInteger(frequency) || frequency < 0) {
      throw new Error(`Line ${i + 1}: invalid frequency "${frequencyRaw}"`);
    }
    rows.push({ text, zhuyin, frequency });
  }
  return rows;
}

/**
 * Build the dictionary artifact. Rows are validated against the alphabet; a repeated
 * (zhuyin, text) pair keeps its first row.
 */
export async function buildDictionary(
  rows: DictionarySourceRow[],
  alphabet: Alphabet,
  version: string
): Promise<Uint8Array> {
  const db = await createDatabase();
  try {
    db.run(`
      CREATE TABLE meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      )
    `);
    db.run(`
      CREATE TABLE phrases (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        zhuyin TEXT NOT NULL,
        phrase TEXT NOT NULL,
        frequency INTEGER NOT NULL DEFAULT ${DEFAULT_FREQUENCY},
        length INTEGER NOT NULL,
        UNIQUE(zhuyin, phrase)
      )
    `);
    db.run('CREATE INDEX idx_zhuyin ON phrases(zhuyin)');
    db.run('INSERT INTO meta (key, value) VALUES (?, ?), (?, ?)', [
      'schema_version',
      SCHEMA_VERSION,
      'dictionary_version',
      version,
    ]);

    for (const row of rows) {
      const syllables = alphabet.parseSequence(row.zhuyin);
      const zhuyin = syllables.map((s) => alphabet.render(s)).join(' ');
      db.run(
        'INSERT OR IGNORE INTO phrases (zhuyin, phrase, frequency, length) VALUES (?, ?, ?, ?)',
        [zhuyin, row.text, row.frequency, [...row.text].length]
      );
    }
    return db.export();
  } finally {
    db.close();
  }
}
