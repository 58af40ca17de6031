import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadAlphabet, type Alphabet } from './alphabet.js';
import { buildDictionary, type DictionarySourceRow } from './dictionary.js';

// Shared fixtures for the service tests

// prettier-ignore
export const FIXTURE_ROWS: DictionarySourceRow[] = [
  { text: '台', zhuyin: 'ㄊㄞˊ', frequency: 80 },
  { text: '抬', zhuyin: 'ㄊㄞˊ', frequency: 40 },
  { text: '臺', zhuyin: 'ㄊㄞˊ', frequency: 10 },
  { text: '太', zhuyin: 'ㄊㄞˋ', frequency: 70 },
  { text: '胎', zhuyin: 'ㄊㄞ', frequency: 20 },
  { text: '台灣', zhuyin: 'ㄊㄞˊ ㄨㄢ', frequency: 500 },
  { text: '台北', zhuyin: 'ㄊㄞˊ ㄅㄟˇ', frequency: 300 },
  { text: '灣', zhuyin: 'ㄨㄢ', frequency: 30 },
  { text: '的', zhuyin: '˙ㄉㄜ', frequency: 150 },
  { text: '學', zhuyin: 'ㄒㄩㄝˊ', frequency: 70 },
  { text: '學生', zhuyin: 'ㄒㄩㄝˊ ㄕㄥ', frequency: 160 },
  { text: '你', zhuyin: 'ㄋㄧˇ', frequency: 100 },
  { text: '好', zhuyin: 'ㄏㄠˇ', frequency: 90 },
  { text: '你好', zhuyin: 'ㄋㄧˇ ㄏㄠˇ', frequency: 200 },
];

let alphabet: Alphabet | null = null;

export function fixtureAlphabet(): Alphabet {
  if (!alphabet) {
    alphabet = loadAlphabet();
  }
  return alphabet;
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'zhuyin-ime-'));
}

export async function writeDictionary(
  dir: string,
  rows: DictionarySourceRow[] = FIXTURE_ROWS,
  version = 'test-1'
): Promise<string> {
  const filePath = path.join(dir, 'dictionary.db');
  fs.writeFileSync(filePath, await buildDictionary(rows, fixtureAlphabet(), version));
  return filePath;
}
