import type { DictionaryEntry, UserPhrase } from '../../shared/types.js';
import { describeError, type EngineError } from '../errors.js';
import type { Alphabet } from './alphabet.js';
import { createEntry, DictionaryStore } from './dictionary.js';
import type { LearningStore } from './learning.js';

// User phrases outrank common dictionary entries under the same syllables
export const USER_PHRASE_FREQUENCY = 1000;

export type PhraseResult =
  | { ok: true; phrase: UserPhrase; changed: boolean; warning?: EngineError }
  | { ok: false; error: string };

/**
 * Phrases the user added, kept in the learning store and served as a second,
 * rebuildable dictionary. Entry order starts after the main dictionary's.
 */
export class UserPhraseBook {
  private current: DictionaryStore;

  constructor(
    private readonly alphabet: Alphabet,
    private readonly learning: LearningStore,
    private readonly orderOffset = 0
  ) {
    this.current = this.build();
  }

  get store(): DictionaryStore {
    return this.current;
  }

  list(): UserPhrase[] {
    return this.learning.phrases();
  }

  add(zhuyin: string, text: string): PhraseResult {
    const parsed = this.normalize(zhuyin, text);
    if (!parsed.ok) return parsed;
    const { changed, warning } = this.learning.addPhrase(parsed.zhuyin, parsed.text);
    if (changed) {
      this.current = this.build();
      console.log(`[phrases] Added ${parsed.text} (${parsed.zhuyin})`);
    }
    const phrase = this.list().find((p) => p.zhuyin === parsed.zhuyin && p.text === parsed.text);
    if (!phrase) {
      return { ok: false, error: `Phrase ${parsed.text} was not stored` };
    }
    return { ok: true, phrase, changed, warning };
  }

  remove(zhuyin: string, text: string): PhraseResult {
    const parsed = this.normalize(zhuyin, text);
    if (!parsed.ok) return parsed;
    const existing = this.list().find((p) => p.zhuyin === parsed.zhuyin && p.text === parsed.text);
    if (!existing) {
      return { ok: false, error: `No user phrase ${parsed.text} (${parsed.zhuyin})` };
    }
    const { warning } = this.learning.removePhrase(parsed.zhuyin, parsed.text);
    this.current = this.build();
    console.log(`[phrases] Removed ${parsed.text} (${parsed.zhuyin})`);
    return { ok: true, phrase: existing, changed: true, warning };
  }

  private normalize(
    zhuyin: string,
    text: string
  ): { ok: true; zhuyin: string; text: string } | { ok: false; error: string } {
    const trimmed = text.trim();
    if (trimmed === '') {
      return { ok: false, error: 'Phrase text is empty' };
    }
    try {
      const syllables = this.alphabet.parseSequence(zhuyin);
      return { ok: true, zhuyin: syllables.map((s) => this.alphabet.render(s)).join(' '), text: trimmed };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }

  private build(): DictionaryStore {
    const entries: DictionaryEntry[] = [];
    for (const phrase of this.learning.phrases()) {
      try {
        const syllables = this.alphabet.parseSequence(phrase.zhuyin);
        entries.push(
          createEntry(phrase.text, syllables, USER_PHRASE_FREQUENCY, this.orderOffset + entries.length)
        );
      } catch (error) {
        console.warn(`[phrases] Skipping ${phrase.text} (${phrase.zhuyin}): ${describeError(error)}`);
      }
    }
    return new DictionaryStore(entries, 'user');
  }
}
