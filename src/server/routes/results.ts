import { Router } from 'express';
import type { ResultStore } from '../services/results.js';

export function createResultsRouter(results: ResultStore): Router {
  const router = Router();

  // Read once: a second request for the same caller gets 404
  router.get('/:callerId', (req, res) => {
    const text = results.take(req.params.callerId);
    if (text === undefined) {
      return res.status(404).json({ error: 'No result for this caller' });
    }
    res.json({ text });
  });

  return router;
}
