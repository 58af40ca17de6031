import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type {
  PartialSyllable,
  Syllable,
  SymbolClass,
  Tone,
  ZhuyinSymbol,
} from '../../shared/types.js';
import { EngineError } from '../errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const defaultSymbolsPath = path.join(__dirname, '../../../data/zhuyin-symbols.json');

// Classes that may follow each class inside one syllable
const TRANSITIONS: Record<SymbolClass | 'empty', readonly SymbolClass[]> = {
  empty: ['initial', 'medial', 'final'],
  initial: ['medial', 'final', 'tone'],
  medial: ['final', 'tone'],
  final: ['tone'],
  tone: [],
};

// ㄐㄑㄒ only combine with ㄧ/ㄩ, ㄓㄔㄕㄖㄗㄘㄙ never with ㄩ
const PALATAL_INITIALS = new Set(['j', 'q', 'x']);
const PALATAL_MEDIALS = new Set(['i', 'v']);
const RETROFLEX_INITIALS = new Set(['zh', 'ch', 'sh', 'r', 'z', 'c', 's']);

const symbolSchema = z.discriminatedUnion('class', [
  z.object({
    id: z.string().min(1),
    glyph: z.string().min(1),
    class: z.enum(['initial', 'medial', 'final']),
    order: z.number().int(),
  }),
  z.object({
    id: z.string().min(1),
    glyph: z.string().min(1),
    class: z.literal('tone'),
    order: z.number().int(),
    tone: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]),
  }),
]);

const symbolTableSchema = z.object({
  version: z.number().int(),
  symbols: z.array(symbolSchema).min(1),
});

/**
 * Static table of Zhuyin symbols with lookups by id and by glyph.
 */
export class Alphabet {
  private readonly byId = new Map<string, ZhuyinSymbol>();
  private readonly byGlyph = new Map<string, ZhuyinSymbol>();
  private readonly toneSymbols = new Map<Tone, ZhuyinSymbol>();

  constructor(symbols: ZhuyinSymbol[]) {
    for (const symbol of symbols) {
      if (this.byId.has(symbol.id)) {
        throw new Error(`Duplicate symbol id "${symbol.id}"`);
      }
      if (this.byGlyph.has(symbol.glyph)) {
        throw new Error(`Duplicate symbol glyph "${symbol.glyph}"`);
      }
      this.byId.set(symbol.id, symbol);
      this.byGlyph.set(symbol.glyph, symbol);
      if (symbol.tone !== undefined) {
        this.toneSymbols.set(symbol.tone, symbol);
      }
    }
  }

  get size(): number {
    return this.byId.size;
  }

  find(symbolId: string): ZhuyinSymbol | undefined {
    return this.byId.get(symbolId);
  }

  get(symbolId: string): ZhuyinSymbol {
    const symbol = this.byId.get(symbolId);
    if (!symbol) {
      throw new EngineError('InvalidSymbol', `Unknown symbol "${symbolId}"`);
    }
    return symbol;
  }

  classOf(symbolId: string): SymbolClass {
    return this.get(symbolId).class;
  }

  fromGlyph(glyph: string): ZhuyinSymbol | undefined {
    return this.byGlyph.get(glyph);
  }

  toneSymbol(tone: Tone): ZhuyinSymbol | undefined {
    return this.toneSymbols.get(tone);
  }

  symbolsOf(cls: SymbolClass): ZhuyinSymbol[] {
    return [...this.byId.values()].filter((s) => s.class === cls).sort((a, b) => a.order - b.order);
  }

  isValidTransition(current: SymbolClass | null, incoming: SymbolClass): boolean {
    return TRANSITIONS[current ?? 'empty'].includes(incoming);
  }

  /**
   * Returns a message when `symbol` cannot join `partial` for phonotactic reasons,
   * or null when the combination is allowed. Class ordering is checked separately.
   */
  checkCombination(partial: PartialSyllable, symbol: ZhuyinSymbol): string | null {
    const initial = partial.initial;
    if (!initial) return null;
    const initialGlyph = this.find(initial)?.glyph ?? initial;

    if (PALATAL_INITIALS.has(initial)) {
      if (symbol.class === 'medial' && !PALATAL_MEDIALS.has(symbol.id)) {
        return `${initialGlyph} cannot combine with ${symbol.glyph}`;
      }
      if (symbol.class === 'final' && !partial.medial) {
        return `${initialGlyph} needs the medial ㄧ or ㄩ before a final`;
      }
    }
    if (RETROFLEX_INITIALS.has(initial) && symbol.class === 'medial' && symbol.id === 'v') {
      return `${initialGlyph} cannot combine with ${symbol.glyph}`;
    }
    return null;
  }

  /**
   * Symbol ids that may legally follow the partial syllable, in display order.
   */
  nextSymbols(partial: PartialSyllable): string[] {
    const current = lastClass(partial);
    return [...this.byId.values()]
      .sort((a, b) => a.order - b.order)
      .filter((s) => {
        if (s.class === 'tone' && current === null) return false;
        return this.isValidTransition(current, s.class) && this.checkCombination(partial, s) === null;
      })
      .map((s) => s.id);
  }

  /**
   * Parse one syllable written in glyphs, e.g. "ㄊㄞˊ" or "˙ㄉㄜ".
   * A syllable without a tone mark is first tone.
   */
  parseSyllable(glyphs: string): Syllable {
    const syllable: PartialSyllable = {};
    let tone: Tone | undefined;
    let previous: SymbolClass | null = null;

    for (const glyph of glyphs) {
      const symbol = this.fromGlyph(glyph);
      if (!symbol) {
        throw new Error(`Unknown glyph "${glyph}" in "${glyphs}"`);
      }
      if (symbol.class === 'tone') {
        if (tone !== undefined) throw new Error(`Two tone marks in "${glyphs}"`);
        tone = symbol.tone;
        continue;
      }
      if (!this.isValidTransition(previous, symbol.class)) {
        throw new Error(`Symbol ${glyph} is out of order in "${glyphs}"`);
      }
      syllable[symbol.class] = symbol.id;
      previous = symbol.class;
    }

    if (previous === null) {
      throw new Error(`Syllable "${glyphs}" has no initial, medial or final`);
    }
    return { ...syllable, tone: tone ?? 1 };
  }

  /**
   * Parse a space separated glyph sequence, e.g. "ㄊㄞˊ ㄨㄢ".
   */
  parseSequence(zhuyin: string): Syllable[] {
    const parts = zhuyin.trim().split(/\s+/).filter((p) => p !== '');
    if (parts.length === 0) {
      throw new Error('Empty zhuyin sequence');
    }
    return parts.map((part) => this.parseSyllable(part));
  }

  renderPartial(partial: PartialSyllable): string {
    return [partial.initial, partial.medial, partial.final]
      .map((id) => (id ? this.get(id).glyph : ''))
      .join('');
  }

  render(syllable: Syllable): string {
    const body = this.renderPartial(syllable);
    if (syllable.tone === 1) return body;
    const mark = this.toneSymbol(syllable.tone)?.glyph ?? String(syllable.tone);
    return syllable.tone === 5 ? mark + body : body + mark;
  }
}

export function lastClass(partial: PartialSyllable): SymbolClass | null {
  if (partial.final) return 'final';
  if (partial.medial) return 'medial';
  if (partial.initial) return 'initial';
  return null;
}

export function loadAlphabet(filePath: string = defaultSymbolsPath): Alphabet {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Symbol table not found at ${filePath}`);
  }
  const parsed = symbolTableSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`Invalid symbol table at ${filePath}: ${parsed.error.message}`);
  }
  const alphabet = new Alphabet(parsed.data.symbols);
  console.log(`[alphabet] Loaded ${alphabet.size} symbols (table v${parsed.data.version})`);
  return alphabet;
}
