import { Router } from 'express';
import { buildDashboard } from '../services/study/dashboard';
import type { StudyStore } from '../services/study/studyStore';
import { handleRouteError } from '../utils/errors';

export function createDashboardRouter(store: StudyStore): Router {
  const router = Router();

  /**
   * GET /api/dashboard
   * Hours for today/week/month, all modules, latest recommendation
   */
  router.get('/api/dashboard', async (_req, res) => {
    try {
      res.json(await buildDashboard(store));
    } catch (err) {
      handleRouteError(err, res, 'Failed to build dashboard');
    }
  });

  return router;
}
