import type {
  Candidate,
  DictionaryHit,
  ErrorInfo,
  EventOutcome,
  KeyEvent,
  KeyResult,
  SessionConfig,
  SessionState,
  Syllable,
} from '../../shared/types.js';
import { errorInfo } from '../errors.js';
import type { Alphabet } from './alphabet.js';
import { CommitBuffer } from './buffer.js';
import { SyllableComposer, type ComposerEvent } from './composer.js';
import { createEntry, type DictionaryStore } from './dictionary.js';
import type { LearningStore } from './learning.js';
import type { UserPhraseBook } from './phrases.js';
import { toPunctuation } from './punctuation.js';
import { rank, type RankOptions } from './ranker.js';
import type { ResultStore } from './results.js';
import { contextKey, continuationKey, isEmptyPartial, syllableKey } from './zhuyin.js';

// Upper bound on entries pulled for a partial-syllable query before ranking
const PREFIX_SCAN_LIMIT = 200;

export interface SessionDeps {
  alphabet: Alphabet;
  dictionary: DictionaryStore;
  learning: LearningStore;
  phrases: UserPhraseBook;
  results: ResultStore;
  rankOptions?: RankOptions;
}

/**
 * One input session: composes syllables from key events, offers ranked
 * candidates and collects committed text until submit.
 */
export class InputSession {
  private readonly composer: SyllableComposer;
  private readonly buffer: CommitBuffer;
  private pending: Syllable[] = [];
  private candidates: Candidate[] = [];
  private closed = false;

  constructor(
    readonly callerId: string,
    readonly config: SessionConfig,
    private readonly deps: SessionDeps
  ) {
    this.composer = new SyllableComposer(deps.alphabet);
    this.buffer = new CommitBuffer(config.initialText);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  handle(event: KeyEvent): KeyResult {
    const outcome = this.dispatch(event);
    return { outcome, state: this.snapshot() };
  }

  snapshot(): SessionState {
    const { alphabet } = this.deps;
    const partial = alphabet.renderPartial(this.composer.partial);
    return {
      callerId: this.callerId,
      closed: this.closed,
      preedit: this.pending.map((s) => alphabet.render(s)).join('') + partial,
      pending: this.pending.map(syllableKey),
      partial,
      candidates: [...this.candidates],
      continuing: !this.composing && this.candidates.length > 0,
      text: this.buffer.text,
      cursor: this.buffer.cursor,
    };
  }

  private get composing(): boolean {
    return this.pending.length > 0 || !this.composer.isEmpty;
  }

  private dispatch(event: KeyEvent): EventOutcome {
    if (this.closed) {
      return { type: 'rejected', error: errorInfo('SessionClosed', 'The session has already been submitted') };
    }

    switch (event.type) {
      case 'symbol': {
        const symbol = this.deps.alphabet.find(event.symbolId);
        if (!symbol) {
          return { type: 'ignored', error: errorInfo('InvalidSymbol', `Unknown symbol "${event.symbolId}"`) };
        }
        return this.applyComposer(this.composer.feed(symbol));
      }
      case 'complete':
        return this.applyComposer(this.composer.complete());
      case 'select':
        return this.select(event.index);
      case 'delete':
        return this.deleteBack();
      case 'punctuation':
        return this.punctuation(event.char);
      case 'cursor':
        if (this.composing) {
          return {
            type: 'rejected',
            error: errorInfo('InvalidTransition', 'Cannot move the cursor while composing'),
          };
        }
        this.candidates = [];
        return { type: 'cursorMoved', cursor: this.buffer.moveCursor(event.direction) };
      case 'navigate':
        return { type: 'ignored' };
      case 'cancel':
        this.resetCompose();
        this.buffer.clear();
        return { type: 'cancelled' };
      case 'submit':
        return this.submit();
    }
  }

  private applyComposer(event: ComposerEvent): EventOutcome {
    switch (event.type) {
      case 'rejected':
        return { type: 'rejected', error: event.error };
      case 'composing':
        this.refresh();
        return { type: 'composing', preedit: this.snapshot().preedit };
      case 'completed': {
        this.pending.push(event.syllable);
        this.refresh();
        if (this.candidates.length === 0) {
          const preedit = this.snapshot().preedit;
          return { type: 'noCandidates', error: errorInfo('NoCandidates', `No candidates for ${preedit}`) };
        }
        if (this.config.autoSubmitSingleCandidate && this.candidates.length === 1) {
          return this.commitCandidate(this.candidates[0], true);
        }
        return { type: 'candidates', count: this.candidates.length };
      }
    }
  }

  private select(index: number): EventOutcome {
    const candidate = this.candidates[index - 1];
    if (index < 1 || !candidate) {
      return {
        type: 'rejected',
        error: errorInfo('NoSuchCandidate', `No candidate ${index} (${this.candidates.length} available)`),
      };
    }
    return this.commitCandidate(candidate, false);
  }

  private commitCandidate(candidate: Candidate, auto: boolean): EventOutcome {
    this.buffer.commit(candidate.text);
    const warning = this.learn(candidate);
    this.resetCompose();
    this.candidates = this.continuations(candidate.text);
    return warning
      ? { type: 'committed', text: candidate.text, auto, warning }
      : { type: 'committed', text: candidate.text, auto };
  }

  /**
   * Record a selection under the query it was picked from and under its own
   * syllables, so a pick from a partial syllable also counts for the full one.
   */
  private learn(candidate: Candidate): ErrorInfo | undefined {
    if (!this.config.learningEnabled) return undefined;
    const { learning } = this.deps;
    let warning = learning.record(candidate.contextKey, candidate.text);
    if (candidate.syllableKey !== '' && candidate.syllableKey !== candidate.contextKey) {
      warning = learning.record(candidate.syllableKey, candidate.text) ?? warning;
    }
    return warning?.toInfo();
  }

  private deleteBack(): EventOutcome {
    if (!this.composer.isEmpty) {
      this.composer.deleteLast();
      this.refresh();
      return { type: 'deleted' };
    }
    if (this.pending.length > 0) {
      this.pending.pop();
      this.refresh();
      return { type: 'deleted' };
    }
    const result = this.buffer.deleteBack();
    if (!result.ok) {
      return { type: 'nothingToDelete', error: result.error };
    }
    this.candidates = [];
    return { type: 'deleted' };
  }

  private punctuation(char: string): EventOutcome {
    const text = toPunctuation(char, this.config.fullWidthPunctuation);
    if (text === undefined) {
      return { type: 'ignored', error: errorInfo('InvalidSymbol', `"${char}" is not a punctuation key`) };
    }
    if (this.composing) {
      return {
        type: 'rejected',
        error: errorInfo('InvalidTransition', 'Select a candidate or delete the syllables first'),
      };
    }
    this.buffer.commit(text);
    this.candidates = [];
    return { type: 'committed', text, auto: false };
  }

  private submit(): EventOutcome {
    if (this.composing && this.candidates.length > 0) {
      this.commitCandidate(this.candidates[0], false);
    }
    this.resetCompose();

    const text = this.buffer.finalize();
    this.deps.results.put(this.callerId, text);
    this.closed = true;
    console.log(`[session] Submitted ${[...text].length} characters for ${this.callerId}`);
    return { type: 'finalized', text };
  }

  private resetCompose(): void {
    this.composer.reset();
    this.pending = [];
    this.candidates = [];
  }

  private refresh(): void {
    const partial = this.composer.partial;
    if (this.pending.length === 0 && isEmptyPartial(partial)) {
      this.candidates = [];
      return;
    }

    const { dictionary, phrases } = this.deps;
    const fuzzyTone = this.config.fuzzyToneMatching;
    const hits: DictionaryHit[] = [];
    for (const store of [dictionary, phrases.store]) {
      hits.push(
        ...(isEmptyPartial(partial)
          ? store.lookup(this.pending, { fuzzyTone })
          : store.lookupPrefix(this.pending, partial, { fuzzyTone, limit: PREFIX_SCAN_LIMIT }))
      );
    }

    const context = contextKey(this.pending, partial);
    this.candidates = this.rankHits(context, hits);
  }

  /**
   * Candidates that carry on from the last committed character: the rest of each
   * phrase that starts with it.
   */
  private continuations(committed: string): Candidate[] {
    const chars = [...committed];
    const last = chars[chars.length - 1];
    if (last === undefined) return [];

    const hits: DictionaryHit[] = [];
    for (const store of [this.deps.dictionary, this.deps.phrases.store]) {
      for (const entry of store.associated(last, PREFIX_SCAN_LIMIT)) {
        const rest = [...entry.text].slice(1).join('');
        if (rest === '') continue;
        hits.push({
          entry: createEntry(rest, entry.syllables.slice(1), entry.frequency, entry.order),
          match: 'associated',
        });
      }
    }
    return this.rankHits(continuationKey(last), hits);
  }

  private rankHits(context: string, hits: DictionaryHit[]): Candidate[] {
    return rank(context, hits, this.adjustments(context, hits), this.config.candidateCount, this.deps.rankOptions);
  }

  /**
   * Learning boosts for the query context, merged with boosts each hit earned under
   * its own syllables. A text keeps the larger of the two.
   */
  private adjustments(context: string, hits: DictionaryHit[]): Map<string, number> {
    const result = new Map<string, number>();
    if (!this.config.learningEnabled) return result;

    const { learning } = this.deps;
    const keep = (text: string, value: number): void => {
      if (value > (result.get(text) ?? 0)) result.set(text, value);
    };
    learning.boost(context).forEach((value, text) => keep(text, value));

    const textsByKey = new Map<string, Set<string>>();
    for (const { entry } of hits) {
      if (entry.key === '' || entry.key === context) continue;
      const texts = textsByKey.get(entry.key) ?? new Set<string>();
      texts.add(entry.text);
      textsByKey.set(entry.key, texts);
    }
    textsByKey.forEach((texts, key) => {
      learning.boost(key).forEach((value, text) => {
        if (texts.has(text)) keep(text, value);
      });
    });
    return result;
  }
}
