import { Router } from 'express';
import type { VocabLoaderService } from '@/services/vocab-loader.service';
import { asyncHandler } from '@/middleware/errorHandler';
import { validateRequest } from '@/middleware/validation';
import { LoadTopicSchema, type LoadTopicInput } from '@/schemas/topic.schemas';

export function createTopicsRouter({ vocabLoader }: { vocabLoader: VocabLoaderService }): Router {
  const router = Router();

  /**
   * GET /api/topics
   * Vocabulary files available for loading
   */
  router.get('/', asyncHandler(async (_req, res) => {
    const topics = await vocabLoader.listTopicFiles();
    return res.json({ success: true, data: topics });
  }));

  /**
   * POST /api/topics/load
   * Load one vocabulary file; clearExisting wipes all cards first
   */
  router.post('/load', validateRequest(LoadTopicSchema), asyncHandler(async (req, res) => {
    const { filename, clearExisting }: LoadTopicInput = req.body;
    const result = await vocabLoader.loadTopic(filename, { clearExisting });
    return res.json({ success: true, data: result });
  }));

  /**
   * POST /api/topics/sync
   * Load every vocabulary file
   */
  router.post('/sync', asyncHandler(async (_req, res) => {
    const result = await vocabLoader.syncAllTopics();
    return res.json({ success: true, data: result });
  }));

  return router;
}
