/**
 * Recipes Controller
 * POST /api/recipes/recommend - one query turn
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { createValidationError } from '../middleware/error.middleware.js';
import type { Recommender } from '../services/recipes/recommender.service.js';

export const RecommendRequestSchema = z.object({
  query: z.string().max(500),
  topN: z.number().int().min(1).max(20).optional(),
}).strict();

export type RecommendRequest = z.infer<typeof RecommendRequestSchema>;

export function createRecipesRouter(recommender: Recommender): Router {
  const router = Router();

  router.post('/recipes/recommend', async (req: Request, res: Response, next: NextFunction) => {
    const validation = RecommendRequestSchema.safeParse(req.body);
    if (!validation.success) {
      next(createValidationError('Invalid request body', validation.error.flatten()));
      return;
    }

    try {
      const { query, topN } = validation.data;
      const result = await recommender.recommend(query, { topN, log: req.log });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
