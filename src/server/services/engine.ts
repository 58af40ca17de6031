import { randomUUID } from 'crypto';
import type { KeyEvent, KeyResult, SessionConfig } from '../../shared/types.js';
import type { EngineError } from '../errors.js';
import { parseSessionConfig } from '../schemas.js';
import { loadAlphabet, type Alphabet } from './alphabet.js';
import { loadDictionary, type DictionaryStore } from './dictionary.js';
import { openLearningStore, type LearningOptions, type LearningStore } from './learning.js';
import { UserPhraseBook } from './phrases.js';
import type { RankOptions } from './ranker.js';
import { DEFAULT_RESULT_TTL_MS, ResultStore } from './results.js';
import { InputSession } from './session.js';

export interface EngineOptions {
  dictionaryPath: string;
  symbolsPath?: string;
  learningPath: string | null; // null keeps learning in memory
  resultTtlMs?: number;
  rank?: RankOptions;
  learning?: LearningOptions;
}

export const DEFAULT_SESSION_IDLE_MS = 30 * 60 * 1000;

export interface SessionManagerOptions {
  idleMs?: number;
  now?: () => number;
}

interface LiveSession {
  session: InputSession;
  lastActive: number;
}

export class ImeEngine {
  readonly results: ResultStore;
  readonly phrases: UserPhraseBook;

  private constructor(
    readonly alphabet: Alphabet,
    readonly dictionary: DictionaryStore,
    readonly learning: LearningStore,
    readonly warnings: EngineError[],
    private readonly rankOptions: RankOptions,
    resultTtlMs: number,
    now: () => number
  ) {
    this.results = new ResultStore(resultTtlMs, now);
    this.phrases = new UserPhraseBook(alphabet, learning, dictionary.size);
  }

  /**
   * Load everything a session needs. Throws DictionaryLoadFailure when the
   * dictionary is missing or unreadable; a learning store that cannot be written is
   * only a warning.
   */
  static async open(options: EngineOptions): Promise<ImeEngine> {
    const alphabet = loadAlphabet(options.symbolsPath);
    const dictionary = await loadDictionary(options.dictionaryPath, alphabet);
    const { store, warning } = await openLearningStore(options.learningPath, options.learning);
    return new ImeEngine(
      alphabet,
      dictionary,
      store,
      warning ? [warning] : [],
      options.rank ?? {},
      options.resultTtlMs ?? DEFAULT_RESULT_TTL_MS,
      options.learning?.now ?? Date.now
    );
  }

  createSession(callerId: string, config: Partial<SessionConfig> = {}): InputSession {
    const parsed = parseSessionConfig(config);
    if (!parsed.ok) {
      throw new Error(`Invalid session config: ${parsed.message}`);
    }
    return new InputSession(callerId, parsed.value, {
      alphabet: this.alphabet,
      dictionary: this.dictionary,
      learning: this.learning,
      phrases: this.phrases,
      results: this.results,
      rankOptions: this.rankOptions,
    });
  }

  close(): void {
    this.learning.close();
  }
}

/**
 * Live sessions by id. A session is dropped once it has been submitted; its text
 * stays reachable through the engine's result store. Sessions left without events
 * for `idleMs` are dropped by expireIdle().
 */
export class SessionManager {
  private readonly sessions = new Map<string, LiveSession>();
  private readonly idleMs: number;
  private readonly now: () => number;

  constructor(
    private readonly engine: ImeEngine,
    options: SessionManagerOptions = {}
  ) {
    this.idleMs = options.idleMs ?? DEFAULT_SESSION_IDLE_MS;
    this.now = options.now ?? Date.now;
  }

  create(callerId: string, config: SessionConfig): { id: string; session: InputSession } {
    const id = randomUUID();
    const session = this.engine.createSession(callerId, config);
    this.sessions.set(id, { session, lastActive: this.now() });
    console.log(`[session] Opened ${id} for ${callerId}`);
    return { id, session };
  }

  get(id: string): InputSession | undefined {
    return this.sessions.get(id)?.session;
  }

  handle(id: string, event: KeyEvent): KeyResult | undefined {
    const live = this.sessions.get(id);
    if (!live) return undefined;
    live.lastActive = this.now();
    const result = live.session.handle(event);
    if (live.session.isClosed) {
      this.sessions.delete(id);
    }
    return result;
  }

  end(id: string): boolean {
    const ended = this.sessions.delete(id);
    if (ended) console.log(`[session] Ended ${id} without a result`);
    return ended;
  }

  /**
   * Drop sessions idle for at least `idleMs`. Returns how many were dropped.
   */
  expireIdle(): number {
    const cutoff = this.now() - this.idleMs;
    let dropped = 0;
    for (const [id, live] of this.sessions) {
      if (live.lastActive <= cutoff) {
        this.sessions.delete(id);
        dropped++;
      }
    }
    if (dropped > 0) console.log(`[session] Dropped ${dropped} idle session(s)`);
    return dropped;
  }

  get size(): number {
    return this.sessions.size;
  }
}
