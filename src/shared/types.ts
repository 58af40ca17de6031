export type SymbolClass = 'initial' | 'medial' | 'final' | 'tone';

export type Tone = 1 | 2 | 3 | 4 | 5;

export const NEUTRAL_TONE: Tone = 5;

export interface ZhuyinSymbol {
  id: string;
  glyph: string;
  class: SymbolClass;
  order: number;
  tone?: Tone; // only for tone symbols
}

export interface PartialSyllable {
  initial?: string;
  medial?: string;
  final?: string;
}

export interface Syllable extends PartialSyllable {
  tone: Tone;
}

export type EntryKind = 'character' | 'phrase';

export interface DictionaryEntry {
  key: string; // e.g. "tai2 wan1"
  syllables: Syllable[];
  text: string;
  frequency: number;
  kind: EntryKind;
  order: number; // insertion order in the source artifact
}

export type MatchKind = 'exact' | 'fuzzy' | 'prefix' | 'associated';

export interface DictionaryHit {
  entry: DictionaryEntry;
  match: MatchKind;
}

export interface LearningRecord {
  contextKey: string;
  text: string;
  useCount: number;
  lastUsed: number; // epoch ms
}

export interface UserPhrase {
  zhuyin: string; // glyphs, e.g. "ㄊㄞˊ ㄨㄢ"
  text: string;
  createdAt: number; // epoch ms
}

export interface Candidate {
  text: string;
  score: number;
  frequency: number;
  order: number;
  match: MatchKind;
  syllableKey: string;
  contextKey: string;
}

export type EngineErrorKind =
  | 'InvalidSymbol'
  | 'InvalidTransition'
  | 'NothingToDelete'
  | 'DictionaryLoadFailure'
  | 'LearningPersistenceUnavailable'
  | 'NoCandidates'
  | 'NoSuchCandidate'
  | 'SessionClosed';

export interface ErrorInfo {
  kind: EngineErrorKind;
  message: string;
}

export type CandidateCount = 5 | 7 | 9;

export interface SessionConfig {
  candidateCount: CandidateCount;
  learningEnabled: boolean;
  autoSubmitSingleCandidate: boolean;
  fullWidthPunctuation: boolean;
  fuzzyToneMatching: boolean;
  initialText: string;
}

export type CursorDirection = 'left' | 'right' | 'home' | 'end';

export type KeyEvent =
  | { type: 'symbol'; symbolId: string }
  | { type: 'complete' }
  | { type: 'select'; index: number } // 1-based fast select
  | { type: 'delete' }
  | { type: 'punctuation'; char: string }
  | { type: 'cursor'; direction: CursorDirection }
  | { type: 'navigate'; direction: 'up' | 'down' | 'left' | 'right' }
  | { type: 'cancel' }
  | { type: 'submit' };

export type EventOutcome =
  | { type: 'composing'; preedit: string }
  | { type: 'candidates'; count: number }
  | { type: 'committed'; text: string; auto: boolean; warning?: ErrorInfo }
  | { type: 'deleted' }
  | { type: 'cursorMoved'; cursor: number }
  | { type: 'cancelled' }
  | { type: 'finalized'; text: string }
  | { type: 'nothingToDelete'; error: ErrorInfo }
  | { type: 'noCandidates'; error: ErrorInfo }
  | { type: 'rejected'; error: ErrorInfo }
  | { type: 'ignored'; error?: ErrorInfo };

export interface SessionState {
  callerId: string;
  closed: boolean;
  preedit: string; // rendered pending syllables + partial syllable
  pending: string[]; // syllable keys
  partial: string; // rendered partial syllable
  candidates: Candidate[];
  continuing: boolean; // candidates continue the last commit rather than pending syllables
  text: string;
  cursor: number;
}

export interface KeyResult {
  outcome: EventOutcome;
  state: SessionState;
}

export interface CreateSessionRequest {
  callerId: string;
  config?: Partial<SessionConfig>;
}

export interface CreateSessionResponse {
  sessionId: string;
  state: SessionState;
}

export interface LearningStats {
  totalSelections: number;
  uniqueTexts: number;
  uniqueContexts: number;
  userPhrases: number;
  persistent: boolean;
}

export interface DictionaryStats {
  version: string;
  total: number;
  characters: number;
  phrases: number;
}
