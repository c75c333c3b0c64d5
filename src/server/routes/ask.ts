/**
 * POST /api/ask   { question, language? }
 *
 * 200 answer or quick reply, 400 rejected question, 429 rate limited,
 * 502 every model failed, 503 no documents or no API key.
 */

import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/async-handler.js';
import { LanguageSchema, parseBody } from '../middleware/validate-body.js';
import type { ServerDeps } from '../types.js';
import type { AnswerResult } from '../../assistant/answer-orchestrator.js';

const AskBodySchema = z.object({
  question: z.string(),
  language: LanguageSchema.optional(),
});

const STATUS: Record<AnswerResult['kind'], number> = {
  answer: 200,
  'quick-reply': 200,
  invalid: 400,
  'rate-limited': 429,
  failed: 502,
};

export function createAskRouter(deps: ServerDeps): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = parseBody(AskBodySchema, req.body);
      const result = await deps.assistant.answerQuestion({
        question: body.question,
        language: body.language ?? deps.defaultLanguage,
      });
      res.status(STATUS[result.kind]).json({
        ...result,
        conversationId: deps.conversations.activeConversationId,
      });
    }),
  );

  return router;
}
