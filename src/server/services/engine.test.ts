import fs from 'fs';
import path from 'path';
import { beforeAll, describe, it, expect } from 'vitest';
import { isEngineError } from '../errors.js';
import type { SessionConfig } from '../../shared/types.js';
import { ImeEngine, SessionManager } from './engine.js';
import { makeTempDir, writeDictionary } from './testing.js';

let dictionaryPath: string;

beforeAll(async () => {
  dictionaryPath = await writeDictionary(makeTempDir());
});

describe('ImeEngine.open', () => {
  it('refuses to start without a dictionary', async () => {
    const error = await ImeEngine.open({
      dictionaryPath: path.join(makeTempDir(), 'missing.db'),
      learningPath: null,
    }).then(
      () => null,
      (e: unknown) => e
    );
    expect(isEngineError(error, 'DictionaryLoadFailure')).toBe(true);
  });

  it('starts with a warning when learning cannot be persisted', async () => {
    const blocker = path.join(makeTempDir(), 'blocker');
    fs.writeFileSync(blocker, '');
    const engine = await ImeEngine.open({ dictionaryPath, learningPath: path.join(blocker, 'learning.db') });

    expect(engine.warnings.map((w) => w.kind)).toEqual(['LearningPersistenceUnavailable']);
    expect(engine.learning.persistent).toBe(false);
    engine.close();
  });

  it('reports a selection that could not be persisted', async () => {
    const dir = makeTempDir();
    const engine = await ImeEngine.open({ dictionaryPath, learningPath: path.join(dir, 'learning.db') });
    expect(engine.warnings).toEqual([]);
    fs.rmSync(dir, { recursive: true, force: true });

    const session = engine.createSession('c');
    for (const symbolId of ['t', 'ai', '2']) session.handle({ type: 'symbol', symbolId });
    const { outcome } = session.handle({ type: 'select', index: 1 });

    expect(outcome).toMatchObject({ type: 'committed', text: '台', auto: false });
    expect(outcome.type === 'committed' && outcome.warning?.kind).toBe('LearningPersistenceUnavailable');
    expect(engine.learning.get('tai2', '台')?.useCount).toBe(1);
  });

  it('applies session config defaults', async () => {
    const engine = await ImeEngine.open({ dictionaryPath, learningPath: null });
    expect(engine.createSession('c').config).toEqual({
      candidateCount: 9,
      learningEnabled: true,
      autoSubmitSingleCandidate: false,
      fullWidthPunctuation: true,
      fuzzyToneMatching: false,
      initialText: '',
    });
  });

  it('passes ranking options to sessions', async () => {
    const engine = await ImeEngine.open({ dictionaryPath, learningPath: null, rank: { prefixPenalty: 1000 } });
    const session = engine.createSession('c');
    const result = session.handle({ type: 'symbol', symbolId: 't' });
    expect(result.state.candidates.map((c) => c.score)).toEqual([-500, -700, -920, -930, -960, -980, -990]);
  });
});

describe('SessionManager', () => {
  it('tracks sessions until they are submitted', async () => {
    const engine = await ImeEngine.open({ dictionaryPath, learningPath: null });
    const sessions = new SessionManager(engine);
    const { id, session } = sessions.create('caller-7', {
      candidateCount: 9,
      learningEnabled: true,
      autoSubmitSingleCandidate: false,
      fullWidthPunctuation: true,
      fuzzyToneMatching: false,
      initialText: '你好',
    });

    expect(sessions.get(id)).toBe(session);
    expect(sessions.handle(id, { type: 'punctuation', char: '.' })?.state.text).toBe('你好。');

    const result = sessions.handle(id, { type: 'submit' });
    expect(result?.outcome).toEqual({ type: 'finalized', text: '你好。' });
    expect(sessions.get(id)).toBeUndefined();
    expect(sessions.size).toBe(0);
    expect(engine.results.take('caller-7')).toBe('你好。');
  });

  it('ends sessions without a result', async () => {
    const engine = await ImeEngine.open({ dictionaryPath, learningPath: null });
    const sessions = new SessionManager(engine);
    const { id } = sessions.create('caller-8', {
      candidateCount: 5,
      learningEnabled: false,
      autoSubmitSingleCandidate: false,
      fullWidthPunctuation: true,
      fuzzyToneMatching: false,
      initialText: '台',
    });

    expect(sessions.end(id)).toBe(true);
    expect(sessions.end(id)).toBe(false);
    expect(sessions.handle(id, { type: 'submit' })).toBeUndefined();
    expect(engine.results.take('caller-8')).toBeUndefined();
  });
});

describe('SessionManager idle expiry', () => {
  const config: SessionConfig = {
    candidateCount: 9,
    learningEnabled: false,
    autoSubmitSingleCandidate: false,
    fullWidthPunctuation: true,
    fuzzyToneMatching: false,
    initialText: '',
  };

  it('drops sessions without events for the idle period', async () => {
    const engine = await ImeEngine.open({ dictionaryPath, learningPath: null });
    let now = 0;
    const sessions = new SessionManager(engine, { idleMs: 1000, now: () => now });
    const active = sessions.create('caller-a', config);
    const idle = sessions.create('caller-b', config);

    now = 600;
    sessions.handle(active.id, { type: 'symbol', symbolId: 't' });

    now = 1200;
    expect(sessions.expireIdle()).toBe(1);
    expect(sessions.get(idle.id)).toBeUndefined();
    expect(sessions.get(active.id)).toBe(active.session);

    now = 1600;
    expect(sessions.expireIdle()).toBe(1);
    expect(sessions.size).toBe(0);
    expect(sessions.handle(active.id, { type: 'submit' })).toBeUndefined();
  });
});
