import { describe, it, expect } from 'vitest';
import { ResultStore } from './results.js';

describe('ResultStore', () => {
  it('hands a result out once', () => {
    const results = new ResultStore();
    results.put('caller-1', '台灣');
    expect(results.peek('caller-1')).toBe('台灣');
    expect(results.take('caller-1')).toBe('台灣');
    expect(results.take('caller-1')).toBeUndefined();
  });

  it('keeps results for different callers apart', () => {
    const results = new ResultStore();
    results.put('a', '你');
    results.put('b', '好');
    expect(results.take('b')).toBe('好');
    expect(results.take('a')).toBe('你');
  });

  it('expires results after the ttl', () => {
    let now = 0;
    const results = new ResultStore(1000, () => now);
    results.put('a', '你');
    now = 500;
    results.put('b', '好');

    now = 999;
    expect(results.expire()).toBe(0);
    now = 1000;
    expect(results.take('a')).toBeUndefined();
    expect(results.size).toBe(1);
    expect(results.take('b')).toBe('好');
  });
});
