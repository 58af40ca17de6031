import { Router } from 'express';
import type { LearningStore } from '../services/learning.js';

export function createLearningRouter(learning: LearningStore): Router {
  const router = Router();

  router.get('/stats', (_req, res) => {
    res.json(learning.stats());
  });

  router.delete('/', (_req, res) => {
    const warning = learning.clear();
    console.log('[learning] History cleared');
    res.json({ ok: true, warning: warning?.toInfo() });
  });

  return router;
}
