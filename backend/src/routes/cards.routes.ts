import { Router } from 'express';
import type { CardService } from '@/services/card.service';
import type { QuizService } from '@/services/quiz.service';
import { asyncHandler } from '@/middleware/errorHandler';
import { parseParams, parseQuery, validateRequest } from '@/middleware/validation';
import {
  CardIdParamSchema,
  CheckAnswerSchema,
  CreateCardSchema,
  GiveUpSchema,
  HintSchema,
  ListCardsQuerySchema,
  RandomCardQuerySchema,
  ResetMasterySchema,
  type CheckAnswerBody,
  type CreateCardInput,
  type GiveUpBody,
  type HintBody,
  type ResetMasteryBody,
} from '@/schemas/card.schemas';
import { HTTP_STATUS } from '@/constants/http.constants';

export interface CardsRouterDeps {
  cardService: CardService;
  quizService: QuizService;
}

export function createCardsRouter({ cardService, quizService }: CardsRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/cards
   * List cards in id order (optional category, skip, limit)
   */
  router.get('/', asyncHandler(async (req, res) => {
    const query = parseQuery(ListCardsQuerySchema, req);
    const cards = await cardService.listCards(query);
    return res.json({ success: true, data: cards });
  }));

  /**
   * POST /api/cards
   * Add a card; an existing (vietnamese, english) pair is returned as is
   */
  router.post('/', validateRequest(CreateCardSchema), asyncHandler(async (req, res) => {
    const body: CreateCardInput = req.body;
    const { card, created } = await cardService.addCard(body);
    return res
      .status(created ? HTTP_STATUS.CREATED : HTTP_STATUS.OK)
      .json({ success: true, data: { card, created } });
  }));

  /**
   * DELETE /api/cards
   * Delete every card
   */
  router.delete('/', asyncHandler(async (_req, res) => {
    const deleted = await cardService.deleteAllCards();
    return res.json({ success: true, data: { deleted } });
  }));

  /**
   * GET /api/cards/random
   * Random card to quiz on (optional mode, category)
   */
  router.get('/random', asyncHandler(async (req, res) => {
    const query = parseQuery(RandomCardQuerySchema, req);
    const card = await quizService.getRandomCard(query);
    return res.json({ success: true, data: card });
  }));

  /**
   * POST /api/cards/mastery/reset
   * Clear the mastered flag (optionally within one category)
   */
  router.post('/mastery/reset', validateRequest(ResetMasterySchema), asyncHandler(async (req, res) => {
    const { category }: ResetMasteryBody = req.body;
    const reset = await cardService.resetMastery(category);
    return res.json({ success: true, data: { reset } });
  }));

  /**
   * POST /api/cards/:id/check
   * Check an answer and record the outcome
   */
  router.post('/:id/check', validateRequest(CheckAnswerSchema), asyncHandler(async (req, res) => {
    const { id } = parseParams(CardIdParamSchema, req);
    const body: CheckAnswerBody = req.body;
    const result = await quizService.checkAnswer({ cardId: id, ...body });
    return res.json({ success: true, data: result });
  }));

  /**
   * POST /api/cards/:id/give-up
   * Reveal the answer; counts as a failure
   */
  router.post('/:id/give-up', validateRequest(GiveUpSchema), asyncHandler(async (req, res) => {
    const { id } = parseParams(CardIdParamSchema, req);
    const { direction }: GiveUpBody = req.body;
    const result = await quizService.giveUp(id, direction);
    return res.json({ success: true, data: result });
  }));

  /**
   * POST /api/cards/:id/hint
   * Progressive hint for the answer side
   */
  router.post('/:id/hint', validateRequest(HintSchema), asyncHandler(async (req, res) => {
    const { id } = parseParams(CardIdParamSchema, req);
    const { level, direction }: HintBody = req.body;
    const result = await quizService.getHint(id, level, direction);
    return res.json({ success: true, data: result });
  }));

  return router;
}
