import type { Candidate, DictionaryHit, MatchKind } from '../../shared/types.js';

export const DEFAULT_FUZZY_TONE_PENALTY = 10;
export const DEFAULT_PREFIX_PENALTY = 20;

export interface RankOptions {
  fuzzyTonePenalty?: number;
  prefixPenalty?: number;
}

function penaltyFor(match: MatchKind, options: RankOptions): number {
  switch (match) {
    case 'fuzzy':
      return options.fuzzyTonePenalty ?? DEFAULT_FUZZY_TONE_PENALTY;
    case 'prefix':
      return options.prefixPenalty ?? DEFAULT_PREFIX_PENALTY;
    default:
      return 0;
  }
}

export function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    b.score - a.score ||
    b.frequency - a.frequency ||
    a.order - b.order ||
    (a.text < b.text ? -1 : a.text > b.text ? 1 : 0)
  );
}

/**
 * Merge dictionary hits with learning adjustments into at most `limit` candidates.
 *
 * score = frequency + boost(text) - penalty(match). Ties fall back to frequency, then
 * dictionary order. A text reachable through several hits keeps its best candidate.
 */
export function rank(
  contextKey: string,
  hits: DictionaryHit[],
  adjustments: ReadonlyMap<string, number>,
  limit: number,
  options: RankOptions = {}
): Candidate[] {
  const best = new Map<string, Candidate>();

  for (const { entry, match } of hits) {
    const candidate: Candidate = {
      text: entry.text,
      score: entry.frequency + (adjustments.get(entry.text) ?? 0) - penaltyFor(match, options),
      frequency: entry.frequency,
      order: entry.order,
      match,
      syllableKey: entry.key,
      contextKey,
    };
    const existing = best.get(candidate.text);
    if (!existing || compareCandidates(candidate, existing) < 0) {
      best.set(candidate.text, candidate);
    }
  }

  return [...best.values()].sort(compareCandidates).slice(0, Math.max(0, limit));
}
