import { Router } from 'express';
import type { RecommendationService } from '../services/recommendation/recommendationService';
import { toRecommendationView } from '../services/study/progress';
import { AppError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export function createRecommendRouter(recommendations: RecommendationService): Router {
  const router = Router();

  /**
   * POST /api/recommend
   * Generates a 14-day study plan from the current module progress
   * 503 when Gemini is not configured, 400 when there are no modules yet
   */
  router.post('/api/recommend', async (_req, res) => {
    try {
      const recommendation = await recommendations.create();
      res.status(201).json(toRecommendationView(recommendation));
    } catch (err) {
      if (err instanceof AppError && err.status !== 500) {
        logger.warn({ err: err.message, status: err.status }, 'Recommendation request rejected');
        res.status(err.status).json(err.toBody());
        return;
      }
      logger.error({ err }, 'Failed to create recommendation');
      res.status(500).json({ error: 'AI generation failed', message: errorMessage(err) });
    }
  });

  /**
   * GET /api/recommend
   * Latest stored recommendation
   */
  router.get('/api/recommend', async (_req, res) => {
    try {
      const recommendation = await recommendations.latest();
      if (!recommendation) {
        res.status(404).json({ message: 'No recommendation available yet' });
        return;
      }
      res.json(toRecommendationView(recommendation));
    } catch (err) {
      logger.error({ err }, 'Failed to load recommendation');
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return router;
}
