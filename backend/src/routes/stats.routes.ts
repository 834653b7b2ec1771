import { Router } from 'express';
import type { CardService } from '@/services/card.service';
import { asyncHandler } from '@/middleware/errorHandler';

/**
 * GET /api/stats and GET /api/categories
 */
export function createStatsRouter({ cardService }: { cardService: CardService }): Router {
  const router = Router();

  router.get('/stats', asyncHandler(async (_req, res) => {
    const stats = await cardService.getStats();
    return res.json({ success: true, data: stats });
  }));

  router.get('/categories', asyncHandler(async (_req, res) => {
    const categories = await cardService.listCategories();
    return res.json({ success: true, data: categories });
  }));

  return router;
}
