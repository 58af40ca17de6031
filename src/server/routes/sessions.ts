import { Router } from 'express';
import type { CreateSessionResponse } from '../../shared/types.js';
import { createSessionSchema, parseEventRequest, parseSessionConfig } from '../schemas.js';
import type { SessionManager } from '../services/engine.js';

export function createSessionsRouter(sessions: SessionManager): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const body = createSessionSchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: 'callerId is required' });
    }
    const config = parseSessionConfig(body.data.config);
    if (!config.ok) {
      return res.status(400).json({ error: `Invalid config: ${config.message}` });
    }

    const { id, session } = sessions.create(body.data.callerId, config.value);
    const response: CreateSessionResponse = { sessionId: id, state: session.snapshot() };
    res.status(201).json(response);
  });

  router.get('/:id', (req, res) => {
    const session = sessions.get(req.params.id);
    if (!session) {
      return res.status(404).json({ error: 'Session not found' });
    }
    res.json({ state: session.snapshot() });
  });

  router.post('/:id/events', (req, res) => {
    const event = parseEventRequest(req.body);
    if (!event.ok) {
      return res.status(400).json({ error: `Invalid event: ${event.message}` });
    }
    const result = sessions.handle(req.params.id, event.value);
    if (!result) {
      return res.status(404).json({ error: 'Session not found' });
    }
    res.json(result);
  });

  router.delete('/:id', (req, res) => {
    if (!sessions.end(req.params.id)) {
      return res.status(404).json({ error: 'Session not found' });
    }
    res.json({ ok: true });
  });

  return router;
}
