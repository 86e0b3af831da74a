import { Router, Request, Response } from 'express';
import { QuestionNotFoundError } from '../errors/domain-errors.js';
import { asyncHandler } from '../middleware/error-handler.js';
import type { QuestionService } from '../services/question.service.js';
import { CreateQuestionSchema } from '../validation/schemas.js';

export function createQuestionRouter(questionService: QuestionService): Router {
  const router = Router();

  /**
   * POST /api/questions
   * Add a question to the catalog
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const input = CreateQuestionSchema.parse(req.body);
      const questionId = await questionService.createQuestion(input);
      res.status(201).json({ questionId });
    })
  );

  /**
   * GET /api/questions/:id
   */
  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const question = await questionService.getQuestionById(req.params.id);
      if (!question) {
        throw new QuestionNotFoundError(req.params.id);
      }
      res.json(question);
    })
  );

  return router;
}
