import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { loadServerConfig } from './config.js';
import { describeError } from './errors.js';
import { ImeEngine, SessionManager } from './services/engine.js';
import { createLearningRouter } from './routes/learning.js';
import { createPhrasesRouter } from './routes/phrases.js';
import { createResultsRouter } from './routes/results.js';
import { createSessionsRouter } from './routes/sessions.js';

async function main() {
  const config = loadServerConfig();

  // Dictionary problems are fatal here: no engine, no sessions
  const engine = await ImeEngine.open({
    dictionaryPath: config.dictionaryPath,
    symbolsPath: config.symbolsPath,
    learningPath: config.learningPath,
    resultTtlMs: config.resultTtlMs,
  });
  for (const warning of engine.warnings) {
    console.warn(`[server] ${warning.kind}: ${warning.message}`);
  }
  const sessions = new SessionManager(engine, { idleMs: config.sessionIdleMs });

  const app = express();

  app.use(cors());
  app.use(express.json());

  // API routes
  app.use('/api/sessions', createSessionsRouter(sessions));
  app.use('/api/results', createResultsRouter(engine.results));
  app.use('/api/learning', createLearningRouter(engine.learning));
  app.use('/api/phrases', createPhrasesRouter(engine.phrases));
  app.get('/api/dictionary/stats', (_req, res) => {
    res.json(engine.dictionary.stats());
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Request failed:', describeError(error));
    res.status(500).json({ error: 'Internal server error' });
  });

  const expiry = setInterval(() => {
    engine.results.expire();
    sessions.expireIdle();
  }, 60_000);
  expiry.unref();

  const server = app.listen(config.port, () => {
    console.log(`[server] Running on http://localhost:${config.port}`);
  });

  const shutdown = () => {
    console.log('[server] Shutting down');
    clearInterval(expiry);
    server.close(() => {
      engine.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[server] Failed to start:', describeError(error));
  process.exit(1);
});
