import { describe, it, expect } from 'vitest';
import { CommitBuffer } from './buffer.js';
import { isEngineError } from '../errors.js';

describe('CommitBuffer', () => {
  it('restores the previous text when a commit is deleted', () => {
    for (const before of ['', '你好', '台灣']) {
      const buffer = new CommitBuffer(before);
      buffer.commit('學生');
      expect(buffer.text).toBe(`${before}學生`);
      expect(buffer.deleteBack()).toEqual({ ok: true, removed: '學生' });
      expect(buffer.text).toBe(before);
    }
  });

  it('seeds one segment per character', () => {
    const buffer = new CommitBuffer('你好');
    expect(buffer.segments).toEqual(['你', '好']);
    expect(buffer.cursor).toBe(2);
    expect(buffer.lastSegment).toBe('好');
  });

  it('inserts at the cursor', () => {
    const buffer = new CommitBuffer();
    buffer.commit('台灣');
    buffer.commit('。');
    expect(buffer.moveCursor('left')).toBe(1);
    buffer.commit('人');
    expect(buffer.text).toBe('台灣人。');
    expect(buffer.cursor).toBe(2);
  });

  it('clamps cursor moves', () => {
    const buffer = new CommitBuffer('ab');
    expect(buffer.moveCursor('right')).toBe(2);
    expect(buffer.moveCursor('home')).toBe(0);
    expect(buffer.moveCursor('left')).toBe(0);
    expect(buffer.moveCursor('end')).toBe(2);
  });

  it('reports nothing to delete at the start', () => {
    const buffer = new CommitBuffer('a');
    buffer.moveCursor('home');
    expect(buffer.deleteBack()).toEqual({
      ok: false,
      error: { kind: 'NothingToDelete', message: 'Nothing before the cursor' },
    });
    expect(buffer.text).toBe('a');
  });

  it('ignores empty commits', () => {
    const buffer = new CommitBuffer();
    buffer.commit('');
    expect(buffer.segments).toEqual([]);
  });

  it('rejects changes after finalize', () => {
    const buffer = new CommitBuffer('台');
    expect(buffer.finalize()).toBe('台');
    expect(buffer.isFinalized).toBe(true);
    try {
      buffer.commit('灣');
      expect.unreachable();
    } catch (error) {
      expect(isEngineError(error, 'SessionClosed')).toBe(true);
    }
    expect(buffer.text).toBe('台');
  });

  it('clears', () => {
    const buffer = new CommitBuffer('台灣');
    buffer.clear();
    expect(buffer.text).toBe('');
    expect(buffer.cursor).toBe(0);
  });
});
