import fs from 'fs';
import path from 'path';
import { describe, it, expect, vi } from 'vitest';
import { openLearningStore, parseRecords, type LearningOptions } from './learning.js';
import { makeTempDir } from './testing.js';

const DAY = 24 * 60 * 60 * 1000;

function clock(start = 1_700_000_000_000): { options: LearningOptions; advance: (ms: number) => void } {
  let now = start;
  return {
    options: { now: () => now },
    advance: (ms) => {
      now += ms;
    },
  };
}

describe('LearningStore', () => {
  it('counts selections per context', async () => {
    const { options } = clock();
    const { store } = await openLearningStore(null, options);

    store.record('tai2 uan1', '台灣');
    store.record('tai2 uan1', '台灣');
    store.record('tai2', '台');

    expect(store.get('tai2 uan1', '台灣')).toEqual({
      contextKey: 'tai2 uan1',
      text: '台灣',
      useCount: 2,
      lastUsed: 1_700_000_000_000,
    });
    expect(store.get('tai2', '台灣')).toBeUndefined();
    expect(store.stats()).toEqual({
      totalSelections: 3,
      uniqueTexts: 2,
      uniqueContexts: 2,
      userPhrases: 0,
      persistent: false,
    });
  });

  it('never lowers the boost of a text that keeps being selected', async () => {
    const { options, advance } = clock();
    const { store } = await openLearningStore(null, options);

    let previous = 0;
    for (let i = 0; i < 5; i++) {
      store.record('tai2 uan1', '台灣');
      const boost = store.boost('tai2 uan1').get('台灣') ?? 0;
      expect(boost).toBeGreaterThan(previous);
      previous = boost;
      advance(DAY);
    }
  });

  it('decays the recency part of the boost', async () => {
    const { options, advance } = clock();
    const { store } = await openLearningStore(null, options);

    store.record('tai2', '抬');
    expect(store.boost('tai2').get('抬')).toBe(100);
    advance(7 * DAY);
    expect(store.boost('tai2').get('抬')).toBe(75);
    expect(store.boost('tai4').size).toBe(0);
  });

  it('takes tunable constants', async () => {
    const { store } = await openLearningStore(null, { boostPerUse: 10, now: () => 0 });
    store.record('ctx', '字');
    expect(store.boost('ctx').get('字')).toBe(10);
  });

  it('survives a reopen', async () => {
    const file = path.join(makeTempDir(), 'nested', 'learning.db');
    const first = await openLearningStore(file, clock().options);
    expect(first.warning).toBeUndefined();
    expect(first.store.persistent).toBe(true);
    expect(first.store.record('tai2 uan1', '台灣')).toBeUndefined();
    first.store.close();

    const second = await openLearningStore(file, clock().options);
    expect(second.store.get('tai2 uan1', '台灣')?.useCount).toBe(1);
    second.store.close();
  });

  it('falls back to memory when the location cannot be written', async () => {
    const blocker = path.join(makeTempDir(), 'blocker');
    fs.writeFileSync(blocker, 'a file where a directory should be');
    const file = path.join(blocker, 'learning.db');

    const first = await openLearningStore(file, clock().options);
    expect(first.warning?.kind).toBe('LearningPersistenceUnavailable');
    expect(first.store.persistent).toBe(false);
    expect(first.store.record('tai2 uan1', '台灣')).toBeUndefined();
    expect(first.store.get('tai2 uan1', '台灣')?.useCount).toBe(1);
    first.store.close();

    const second = await openLearningStore(file, clock().options);
    expect(second.warning?.kind).toBe('LearningPersistenceUnavailable');
    expect(second.store.get('tai2 uan1', '台灣')).toBeUndefined();
  });

  it('loads an existing file it cannot write into memory', async () => {
    const file = path.join(makeTempDir(), 'learning.db');
    const first = await openLearningStore(file, clock().options);
    first.store.record('tai2', '抬');
    first.store.addPhrase('ㄊㄞˊ ㄅㄟˇ', '台北');
    first.store.close();

    const denied = vi.spyOn(fs, 'accessSync').mockImplementation(() => {
      throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    });
    try {
      const second = await openLearningStore(file, clock().options);
      expect(second.warning?.kind).toBe('LearningPersistenceUnavailable');
      expect(second.store.persistent).toBe(false);
      expect(second.store.get('tai2', '抬')?.useCount).toBe(1);
      expect(second.store.phrases().map((p) => p.text)).toEqual(['台北']);

      expect(second.store.record('tai2', '抬')).toBeUndefined();
      expect(second.store.get('tai2', '抬')?.useCount).toBe(2);
      second.store.close();
    } finally {
      denied.mockRestore();
    }

    const third = await openLearningStore(file, clock().options);
    expect(third.store.get('tai2', '抬')?.useCount).toBe(1);
    third.store.close();
  });

  it('keeps learning in memory when a write fails later', async () => {
    const dir = makeTempDir();
    const { store } = await openLearningStore(path.join(dir, 'learning.db'), clock().options);
    fs.rmSync(dir, { recursive: true, force: true });

    const warning = store.record('tai2', '台');
    expect(warning?.kind).toBe('LearningPersistenceUnavailable');
    expect(store.persistent).toBe(false);
    expect(store.record('tai2', '台')).toBeUndefined();
    expect(store.get('tai2', '台')?.useCount).toBe(2);
  });

  it('moves an unreadable file aside', async () => {
    const dir = makeTempDir();
    const file = path.join(dir, 'learning.db');
    fs.writeFileSync(file, 'garbage that is certainly not an sqlite database file at all');

    const { store, warning } = await openLearningStore(file, clock().options);
    expect(warning).toBeUndefined();
    expect(store.stats().totalSelections).toBe(0);
    expect(fs.readdirSync(dir).filter((name) => name.startsWith('learning.db.corrupt-'))).toHaveLength(1);
  });

  it('exports, merges and replaces records', async () => {
    const { options } = clock();
    const { store } = await openLearningStore(null, options);
    store.record('tai2', '抬');
    store.record('tai2', '台');
    store.record('tai2', '台');

    const exported = store.exportRecords();
    expect(exported.map((r) => [r.contextKey, r.text, r.useCount])).toEqual([
      ['tai2', '台', 2],
      ['tai2', '抬', 1],
    ]);

    store.importRecords([{ contextKey: 'tai2', text: '抬', useCount: 3, lastUsed: 5 }], { merge: true });
    expect(store.get('tai2', '抬')).toEqual({
      contextKey: 'tai2',
      text: '抬',
      useCount: 4,
      lastUsed: 1_700_000_000_000,
    });

    store.importRecords([{ contextKey: 'ni3', text: '你', useCount: 2, lastUsed: 5 }], { merge: false });
    expect(store.exportRecords()).toEqual([{ contextKey: 'ni3', text: '你', useCount: 2, lastUsed: 5 }]);

    store.clear();
    expect(store.stats().totalSelections).toBe(0);
  });

  it('stores user phrases apart from history', async () => {
    const file = path.join(makeTempDir(), 'learning.db');
    const { store } = await openLearningStore(file, clock().options);

    expect(store.addPhrase('ㄊㄞˊ ㄅㄟˇ', '台北')).toEqual({ changed: true, warning: undefined });
    expect(store.addPhrase('ㄊㄞˊ ㄅㄟˇ', '台北')).toEqual({ changed: false });
    store.record('tai2', '台');
    store.clear();

    expect(store.phrases()).toEqual([{ zhuyin: 'ㄊㄞˊ ㄅㄟˇ', text: '台北', createdAt: 1_700_000_000_000 }]);
    expect(store.stats().userPhrases).toBe(1);
    store.close();

    const reopened = await openLearningStore(file, clock().options);
    expect(reopened.store.phrases().map((p) => p.text)).toEqual(['台北']);
    expect(reopened.store.removePhrase('ㄊㄞˊ ㄅㄟˇ', '台北').changed).toBe(true);
    expect(reopened.store.removePhrase('ㄊㄞˊ ㄅㄟˇ', '台北')).toEqual({ changed: false });
    expect(reopened.store.stats().userPhrases).toBe(0);
    reopened.store.close();
  });
});

describe('parseRecords', () => {
  it('accepts exported records', () => {
    const records = [{ contextKey: 'tai2', text: '台', useCount: 1, lastUsed: 0 }];
    expect(parseRecords(records)).toEqual(records);
  });

  it('rejects malformed records', () => {
    expect(() => parseRecords([{ contextKey: 'tai2', text: '', useCount: 1, lastUsed: 0 }])).toThrow(
      'Invalid learning records'
    );
    expect(() => parseRecords({ records: [] })).toThrow('Invalid learning records');
  });
});
