import {
  NEUTRAL_TONE,
  type ErrorInfo,
  type PartialSyllable,
  type Syllable,
  type Tone,
  type ZhuyinSymbol,
} from '../../shared/types.js';
import { errorInfo } from '../errors.js';
import { lastClass, type Alphabet } from './alphabet.js';

export type ComposerState = 'empty' | 'hasInitial' | 'hasMedialFinal' | 'awaitingTone' | 'complete';

export type ComposerEvent =
  | { type: 'composing'; state: ComposerState; partial: PartialSyllable }
  | { type: 'completed'; syllable: Syllable }
  | { type: 'rejected'; error: ErrorInfo };

export type DeleteResult =
  | { ok: true; removed: ZhuyinSymbol; state: ComposerState }
  | { ok: false; error: ErrorInfo };

function stateOf(partial: PartialSyllable): ComposerState {
  switch (lastClass(partial)) {
    case null:
      return 'empty';
    case 'initial':
      return 'hasInitial';
    case 'medial':
      return 'hasMedialFinal';
    default:
      return 'awaitingTone';
  }
}

/**
 * Accumulates class-ordered Zhuyin symbols into one syllable.
 *
 * Rejected input never changes the state. On completion the composer empties itself;
 * the caller keeps the emitted syllable.
 */
export class SyllableComposer {
  private symbols: ZhuyinSymbol[] = [];

  constructor(private readonly alphabet: Alphabet) {}

  get state(): ComposerState {
    return stateOf(this.partial);
  }

  get partial(): PartialSyllable {
    const partial: PartialSyllable = {};
    for (const symbol of this.symbols) {
      if (symbol.class !== 'tone') {
        partial[symbol.class] = symbol.id;
      }
    }
    return partial;
  }

  get isEmpty(): boolean {
    return this.symbols.length === 0;
  }

  feed(symbol: ZhuyinSymbol): ComposerEvent {
    const partial = this.partial;
    const current = lastClass(partial);

    if (!this.alphabet.isValidTransition(current, symbol.class)) {
      const after = current ? `after a ${current}` : 'at the start of a syllable';
      return {
        type: 'rejected',
        error: errorInfo('InvalidTransition', `${symbol.glyph} (${symbol.class}) is not accepted ${after}`),
      };
    }

    const conflict = this.alphabet.checkCombination(partial, symbol);
    if (conflict) {
      return { type: 'rejected', error: errorInfo('InvalidTransition', conflict) };
    }

    if (symbol.class === 'tone') {
      return this.finish(symbol.tone ?? NEUTRAL_TONE);
    }

    this.symbols.push(symbol);
    return { type: 'composing', state: this.state, partial: this.partial };
  }

  /**
   * Neutral-tone shortcut: completes whatever has been typed.
   */
  complete(): ComposerEvent {
    if (this.isEmpty) {
      return {
        type: 'rejected',
        error: errorInfo('InvalidTransition', 'Nothing to complete'),
      };
    }
    return this.finish(NEUTRAL_TONE);
  }

  deleteLast(): DeleteResult {
    const removed = this.symbols.pop();
    if (!removed) {
      return { ok: false, error: errorInfo('NothingToDelete', 'No symbol to delete') };
    }
    return { ok: true, removed, state: this.state };
  }

  reset(): void {
    this.symbols = [];
  }

  private finish(tone: Tone): ComposerEvent {
    const syllable: Syllable = { ...this.partial, tone };
    this.symbols = [];
    return { type: 'completed', syllable };
  }
}
