/**
 * Conversation history.
 *
 * GET    /api/conversations        grouped, most recent first
 * POST   /api/conversations        start a new conversation
 * DELETE /api/conversations        clear everything
 * DELETE /api/conversations/:id    delete one conversation
 */

import { Router } from 'express';
import type { ServerDeps } from '../types.js';

export function createConversationsRouter(deps: ServerDeps): Router {
  const router = Router();
  const { conversations } = deps;

  router.get('/', (_req, res) => {
    res.json({
      activeConversationId: conversations.activeConversationId,
      conversations: conversations.groupByConversation(),
    });
  });

  router.post('/', (_req, res) => {
    const conversationId = deps.assistant.startNewConversation();
    res.status(201).json({ conversationId });
  });

  router.delete('/', (_req, res) => {
    const persisted = conversations.clearAll();
    res.json({ cleared: true, persisted });
  });

  router.delete('/:id', (req, res) => {
    const removed = conversations.deleteConversation(req.params.id);
    if (removed === 0) {
      res.status(404).json({ error: `No conversation ${req.params.id}` });
      return;
    }
    res.json({ conversationId: req.params.id, removed });
  });

  return router;
}
