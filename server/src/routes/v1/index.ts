/**
 * API v1 Router Aggregator
 * Centralizes all v1 API routes under /api/v1
 *
 * Route Structure:
 * - /api/v1/chat                  POST (one dialogue turn)
 * - /api/v1/session/:userId       GET, DELETE (debug snapshot / forget)
 * - /api/v1/preferences/:userId   GET
 */

import { Router } from 'express';
import { createDialogueRouter } from '../../controllers/dialogue/dialogue.controller.js';
import type { DialogueRuntime } from '../../services/dialogue/dialogue.factory.js';

export function createV1Router(runtime: DialogueRuntime): Router {
  const router = Router();

  router.use('/', createDialogueRouter(runtime));

  return router;
}
