/**
 * Dialogue Controller
 *
 * POST   /chat                 { message, userId? } -> { response, userId }
 * GET    /session/:userId      debug snapshot of the dialogue session
 * DELETE /session/:userId      forget the session
 * GET    /preferences/:userId  long-lived preference record
 */

import { Router, type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { DialogueRuntime } from '../../services/dialogue/dialogue.factory.js';

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1).max(1000),
  userId: z.string().trim().min(1).max(128).optional()
});

const UserIdParamSchema = z.string().trim().min(1).max(128);

export function createDialogueRouter(runtime: DialogueRuntime): Router {
  const router = Router();
  const { dialogue, sessions, preferences } = runtime;

  router.post('/chat', async (req: Request, res: Response) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid request',
        details: parsed.error.flatten()
      });
    }

    const { message } = parsed.data;
    const userId = parsed.data.userId ?? `anonymous_${uuidv4()}`;
    if (!parsed.data.userId) {
      req.log.info({ event: 'anonymous_user_assigned', userId }, '[Dialogue] No userId provided, generated one');
    }

    try {
      const response = await sessions.withSession(userId, session => dialogue.processTurn(message, session));
      return res.json({ response, userId });
    } catch (error) {
      req.log.error({ event: 'chat_failed', userId, error: error instanceof Error ? error.message : String(error) },
        '[Dialogue] Chat request failed');
      return res.status(500).json({ error: 'Internal error', traceId: req.traceId });
    }
  });

  router.get('/session/:userId', (req: Request, res: Response) => {
    const userId = UserIdParamSchema.safeParse(req.params.userId);
    if (!userId.success) {
      return res.status(400).json({ error: 'Invalid userId' });
    }
    const snapshot = sessions.snapshot(userId.data);
    if (!snapshot) {
      return res.status(404).json({ error: 'Session not found' });
    }
    return res.json(snapshot);
  });

  router.delete('/session/:userId', (req: Request, res: Response) => {
    const userId = UserIdParamSchema.safeParse(req.params.userId);
    if (!userId.success) {
      return res.status(400).json({ error: 'Invalid userId' });
    }
    const deleted = sessions.clear(userId.data);
    return res.json({ status: deleted ? 'deleted' : 'not_found', userId: userId.data });
  });

  router.get('/preferences/:userId', async (req: Request, res: Response) => {
    const userId = UserIdParamSchema.safeParse(req.params.userId);
    if (!userId.success) {
      return res.status(400).json({ error: 'Invalid userId' });
    }
    try {
      const record = await preferences.getUserPreferences(userId.data);
      return res.json(record);
    } catch (error) {
      req.log.error({ event: 'preferences_read_failed', userId: userId.data, error: error instanceof Error ? error.message : String(error) },
        '[Dialogue] Preference lookup failed');
      return res.status(500).json({ error: 'Internal error', traceId: req.traceId });
    }
  });

  return router;
}
