import { Router } from 'express';
import { parsePhrase } from '../schemas.js';
import type { UserPhraseBook } from '../services/phrases.js';

export function createPhrasesRouter(phrases: UserPhraseBook): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(phrases.list());
  });

  router.post('/', (req, res) => {
    const parsed = parsePhrase(req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }
    const result = phrases.add(parsed.value.zhuyin, parsed.value.text);
    if (!result.ok) {
      return res.status(400).json({ error: result.error });
    }
    res.status(result.changed ? 201 : 200).json({ phrase: result.phrase, warning: result.warning?.toInfo() });
  });

  router.delete('/', (req, res) => {
    const parsed = parsePhrase(req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }
    const result = phrases.remove(parsed.value.zhuyin, parsed.value.text);
    if (!result.ok) {
      return res.status(404).json({ error: result.error });
    }
    res.json({ ok: true, warning: result.warning?.toInfo() });
  });

  return router;
}
