import fs from 'fs';
import { loadServerConfig } from '../server/config.js';
import { loadAlphabet } from '../server/services/alphabet.js';
import { openLearningStore, parseRecords } from '../server/services/learning.js';
import { UserPhraseBook } from '../server/services/phrases.js';

// Usage:
//   npm run learning -- stats
//   npm run learning -- export backup.json
//   npm run learning -- import backup.json [--replace]
//   npm run learning -- clear
//   npm run learning -- phrases
//   npm run learning -- add-phrase "ㄊㄞˊ ㄅㄟˇ" 台北
async function run(args: string[]): Promise<void> {
  const [command, file] = args;
  const { learningPath, symbolsPath } = loadServerConfig();
  const { store, warning } = await openLearningStore(learningPath);
  if (warning) {
    throw warning;
  }

  try {
    switch (command) {
      case 'stats': {
        const stats = store.stats();
        console.log(`Learning store: ${learningPath}`);
        console.log(`  selections: ${stats.totalSelections}`);
        console.log(`  texts:      ${stats.uniqueTexts}`);
        console.log(`  contexts:   ${stats.uniqueContexts}`);
        console.log(`  phrases:    ${stats.userPhrases}`);
        break;
      }
      case 'export': {
        if (!file) throw new Error('export needs a file name');
        const records = store.exportRecords();
        fs.writeFileSync(file, JSON.stringify(records, null, 2) + '\n');
        console.log(`Exported ${records.length} records to ${file}`);
        break;
      }
      case 'import': {
        if (!file) throw new Error('import needs a file name');
        const records = parseRecords(JSON.parse(fs.readFileSync(file, 'utf-8')));
        const merge = !args.includes('--replace');
        const failed = store.importRecords(records, { merge });
        if (failed) throw failed;
        console.log(`Imported ${records.length} records (${merge ? 'merged' : 'replaced'})`);
        break;
      }
      case 'clear': {
        const failed = store.clear();
        if (failed) throw failed;
        console.log('Learning history cleared');
        break;
      }
      case 'phrases': {
        for (const phrase of store.phrases()) {
          console.log(`${phrase.text}\t${phrase.zhuyin}`);
        }
        break;
      }
      case 'add-phrase': {
        const [, zhuyin, text] = args;
        if (!zhuyin || !text) throw new Error('add-phrase needs zhuyin and text');
        const book = new UserPhraseBook(loadAlphabet(symbolsPath), store);
        const result = book.add(zhuyin, text);
        if (!result.ok) throw new Error(result.error);
        if (result.warning) throw result.warning;
        console.log(result.changed ? `Added ${result.phrase.text}` : `${result.phrase.text} is already stored`);
        break;
      }
      default:
        throw new Error(
          'Usage: learning stats | export <file> | import <file> [--replace] | clear | phrases | add-phrase <zhuyin> <text>'
        );
    }
  } finally {
    store.close();
  }
}

run(process.argv.slice(2)).catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
