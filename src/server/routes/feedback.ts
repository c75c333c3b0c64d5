/**
 * POST /api/feedback   { rating: 1..5, comment?, question? }
 * GET  /api/feedback   recent entries and the average rating
 */

import { Router } from 'express';
import { z } from 'zod';
import { parseBody } from '../middleware/validate-body.js';
import type { ServerDeps } from '../types.js';
import { sanitizeText } from '../../assistant/input-validation.js';
import { getFeedbackStats, listFeedback, saveFeedback } from '../../storage/feedback-store.js';
import { trackEvent } from '../../storage/analytics-store.js';

const FeedbackBodySchema = z.object({
  rating: z.number().int().min(1).max(5),
  comment: z.string().max(2000).optional(),
  question: z.string().max(2000).optional(),
});

export function createFeedbackRouter(deps: ServerDeps): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const body = parseBody(FeedbackBodySchema, req.body);
    const entry = saveFeedback({
      sessionId: deps.assistant.sessionId,
      rating: body.rating,
      comment: sanitizeText(body.comment ?? '', 1000),
      question: body.question ?? null,
    });
    trackEvent('feedback_submitted', deps.assistant.sessionId, { rating: body.rating });
    res.status(201).json({ feedback: entry });
  });

  router.get('/', (_req, res) => {
    res.json({ stats: getFeedbackStats(), feedback: listFeedback(50) });
  });

  return router;
}
