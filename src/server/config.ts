import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const dataDir = path.join(__dirname, '../../data');

export interface ServerConfig {
  port: number;
  dictionaryPath: string;
  symbolsPath: string;
  learningPath: string;
  resultTtlMs: number;
  sessionIdleMs: number;
}

function defaultLearningPath(env: NodeJS.ProcessEnv): string {
  const base = env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
  return path.join(base, 'zhuyin-ime', 'learning.db');
}

function positiveInt(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: positiveInt(env.PORT, 'PORT', 3000),
    dictionaryPath: path.resolve(env.DICTIONARY_PATH || path.join(dataDir, 'dictionary.db')),
    symbolsPath: path.resolve(env.SYMBOLS_PATH || path.join(dataDir, 'zhuyin-symbols.json')),
    learningPath: path.resolve(env.LEARNING_PATH || defaultLearningPath(env)),
    resultTtlMs: positiveInt(env.RESULT_TTL_SECONDS, 'RESULT_TTL_SECONDS', 300) * 1000,
    sessionIdleMs: positiveInt(env.SESSION_IDLE_SECONDS, 'SESSION_IDLE_SECONDS', 1800) * 1000,
  };
}
