import { Router } from 'express';
import { getAnalyticsSummary, getRecentEvents } from '../../storage/analytics-store.js';

export function createAnalyticsRouter(): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const limit = Number(req.query.limit ?? 20);
    res.json({
      summary: getAnalyticsSummary(),
      recent: getRecentEvents(Number.isInteger(limit) && limit > 0 ? Math.min(limit, 200) : 20),
    });
  });

  return router;
}
