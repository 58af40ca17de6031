import type { PartialSyllable, Syllable } from '../../shared/types.js';

// Key forms concatenate symbol ids in class order: ㄊㄞˊ -> "tai2", ㄊㄞ (partial) -> "tai*"

export function tonelessKey(syllable: PartialSyllable): string {
  return `${syllable.initial ?? ''}${syllable.medial ?? ''}${syllable.final ?? ''}`;
}

export function syllableKey(syllable: Syllable): string {
  return `${tonelessKey(syllable)}${syllable.tone}`;
}

export function partialKey(partial: PartialSyllable): string {
  return `${tonelessKey(partial)}*`;
}

export function sequenceKey(syllables: Syllable[]): string {
  return syllables.map(syllableKey).join(' ');
}

export function tonelessSequenceKey(syllables: Syllable[]): string {
  return syllables.map(tonelessKey).join(' ');
}

/**
 * Context key for a query: completed syllables, then the partial syllable if any.
 * e.g. "tai2 wan1", "tai2 u*"
 */
export function contextKey(completed: Syllable[], partial?: PartialSyllable): string {
  const parts = completed.map(syllableKey);
  if (partial && !isEmptyPartial(partial)) {
    parts.push(partialKey(partial));
  }
  return parts.join(' ');
}

export function isEmptyPartial(partial: PartialSyllable): boolean {
  return !partial.initial && !partial.medial && !partial.final;
}

function symbolList(syllable: PartialSyllable): string[] {
  const out: string[] = [];
  if (syllable.initial) out.push(syllable.initial);
  if (syllable.medial) out.push(syllable.medial);
  if (syllable.final) out.push(syllable.final);
  return out;
}

/**
 * True when the symbols typed so far are a leading run of the syllable's symbols
 * (tone ignored). "ㄊ" prefixes "ㄊㄞ"; "ㄨ" does not prefix "ㄊㄨ".
 */
export function partialPrefixes(partial: PartialSyllable, syllable: PartialSyllable): boolean {
  const typed = symbolList(partial);
  const full = symbolList(syllable);
  if (typed.length > full.length) return false;
  return typed.every((id, i) => full[i] === id);
}

export function sameSyllable(a: Syllable, b: Syllable, ignoreTone = false): boolean {
  if (tonelessKey(a) !== tonelessKey(b)) return false;
  return ignoreTone || a.tone === b.tone;
}

/**
 * Context key for candidates that continue after `character` was committed, e.g. ">台"
 */
export function continuationKey(character: string): string {
  return `>${character}`;
}
