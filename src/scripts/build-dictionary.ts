import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadAlphabet } from '../server/services/alphabet.js';
import { buildDictionary, parseDictionarySource } from '../server/services/dictionary.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const dataDir = path.join(__dirname, '../../data');

// Usage:
//   npm run build:dictionary
//   npm run build:dictionary -- --input=my.tsv --out=/tmp/dictionary.db --version=2024.1
function parseArgs(args: string[]): { input: string; out: string; version: string } {
  let input = path.join(dataDir, 'dictionary.tsv');
  let out = path.join(dataDir, 'dictionary.db');
  let version = new Date().toISOString().slice(0, 10);

  for (const arg of args) {
    if (arg.startsWith('--input=')) {
      input = path.resolve(arg.slice('--input='.length));
    } else if (arg.startsWith('--out=')) {
      out = path.resolve(arg.slice('--out='.length));
    } else if (arg.startsWith('--version=')) {
      version = arg.slice('--version='.length);
    } else {
      throw new Error(`Unknown argument "${arg}"`);
    }
  }
  return { input, out, version };
}

async function build(): Promise<void> {
  const { input, out, version } = parseArgs(process.argv.slice(2));
  const alphabet = loadAlphabet();

  console.log(`Reading ${input}...`);
  const rows = parseDictionarySource(fs.readFileSync(input, 'utf-8'));
  const data = await buildDictionary(rows, alphabet, version);

  fs.mkdirSync(path.dirname(out), { recursive: true });
  fs.writeFileSync(out, data);
  console.log(`Wrote ${rows.length} rows to ${out} (version ${version})`);
}

build().catch((error) => {
  console.error(error);
  process.exit(1);
});
