import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadServerConfig } from './config.js';

describe('loadServerConfig', () => {
  it('uses defaults', () => {
    const config = loadServerConfig({ XDG_DATA_HOME: '/tmp/xdg' });
    expect(config.port).toBe(3000);
    expect(config.resultTtlMs).toBe(300_000);
    expect(config.sessionIdleMs).toBe(1_800_000);
    expect(config.learningPath).toBe(path.resolve('/tmp/xdg/zhuyin-ime/learning.db'));
    expect(path.basename(config.dictionaryPath)).toBe('dictionary.db');
    expect(path.basename(config.symbolsPath)).toBe('zhuyin-symbols.json');
  });

  it('reads overrides', () => {
    const config = loadServerConfig({
      PORT: '8080',
      DICTIONARY_PATH: '/srv/dict.db',
      LEARNING_PATH: '/srv/learning.db',
      RESULT_TTL_SECONDS: '10',
      SESSION_IDLE_SECONDS: '60',
    });
    expect(config).toMatchObject({
      port: 8080,
      dictionaryPath: '/srv/dict.db',
      learningPath: '/srv/learning.db',
      resultTtlMs: 10_000,
      sessionIdleMs: 60_000,
    });
  });

  it('rejects invalid numbers', () => {
    expect(() => loadServerConfig({ PORT: 'eighty' })).toThrow('PORT must be a positive integer, got "eighty"');
    expect(() => loadServerConfig({ RESULT_TTL_SECONDS: '0' })).toThrow('RESULT_TTL_SECONDS');
    expect(() => loadServerConfig({ SESSION_IDLE_SECONDS: '-5' })).toThrow(
      'SESSION_IDLE_SECONDS must be a positive integer, got "-5"'
    );
  });
});
