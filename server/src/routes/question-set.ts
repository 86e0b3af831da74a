import { Router, Request, Response } from 'express';
import { QuestionSetNotFoundError } from '../errors/domain-errors.js';
import { asyncHandler } from '../middleware/error-handler.js';
import type { QuestionSetService } from '../services/question-set.service.js';
import type { QuestionSheetGenerationService } from '../services/question-sheet-generation.service.js';
import type { QuestionSheetService } from '../services/question-sheet.service.js';
import type { QuestionSet } from '../types/models.js';
import { CreateQuestionSetSchema, GenerateSheetsSchema, ResolverQuerySchema } from '../validation/schemas.js';

export interface QuestionSetRouterDeps {
  questionSetService: QuestionSetService;
  questionSheetService: QuestionSheetService;
  generationService: QuestionSheetGenerationService;
}

export function createQuestionSetRouter(deps: QuestionSetRouterDeps): Router {
  const { questionSetService, questionSheetService, generationService } = deps;
  const router = Router();

  const present = (questionSet: QuestionSet) => ({
    id: questionSet.id,
    questionIds: questionSet.questionIds,
    status: questionSetService.getQuestionSetStatus(questionSet),
    publishedAt: questionSet.publishedAt.toISOString(),
    endAt: questionSet.endAt.toISOString(),
  });

  const sendOrNotFound = (res: Response, questionSet: QuestionSet | null, label: string) => {
    if (!questionSet) {
      throw new QuestionSetNotFoundError(label);
    }
    res.json(present(questionSet));
  };

  /**
   * GET /api/question-sets/operating
   * The set whose window contains the current time
   */
  router.get(
    '/operating',
    asyncHandler(async (_req: Request, res: Response) => {
      sendOrNotFound(res, await questionSetService.getOperatingQuestionSet(), 'operating');
    })
  );

  /**
   * GET /api/question-sets/next
   */
  router.get(
    '/next',
    asyncHandler(async (_req: Request, res: Response) => {
      sendOrNotFound(res, await questionSetService.getNextOperatingQuestionSet(), 'next');
    })
  );

  /**
   * GET /api/question-sets/latest
   */
  router.get(
    '/latest',
    asyncHandler(async (_req: Request, res: Response) => {
      sendOrNotFound(res, await questionSetService.getLatestPublishedQuestionSet(), 'latest');
    })
  );

  /**
   * POST /api/question-sets/generate
   * Build the set that follows the latest one
   */
  router.post(
    '/generate',
    asyncHandler(async (_req: Request, res: Response) => {
      const latest = await questionSetService.getLatestPublishedQuestionSet();
      const questionSetId = await questionSetService.createQuestionSet(latest);
      res.status(201).json({ questionSetId });
    })
  );

  /**
   * POST /api/question-sets
   * Body: { questionIds, publishedAt, endAt }
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const input = CreateQuestionSetSchema.parse(req.body);
      const questionSet = await questionSetService.createQuestionSetWithQuestions(
        input.questionIds,
        input.publishedAt,
        input.endAt
      );
      res.status(201).json(present(questionSet));
    })
  );

  /**
   * GET /api/question-sets/:id
   */
  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      sendOrNotFound(res, await questionSetService.getQuestionSetById(req.params.id), req.params.id);
    })
  );

  /**
   * GET /api/question-sets/:id/sheets?resolverId=
   */
  router.get(
    '/:id/sheets',
    asyncHandler(async (req: Request, res: Response) => {
      const { resolverId } = ResolverQuerySchema.parse(req.query);
      const sheets = await questionSheetService.getQuestionSheets(resolverId, req.params.id);
      res.json({ items: sheets, total: sheets.length });
    })
  );

  /**
   * POST /api/question-sets/:id/sheets
   * Body: { resolverId? } - one member, or every member when omitted
   */
  router.post(
    '/:id/sheets',
    asyncHandler(async (req: Request, res: Response) => {
      const { resolverId } = GenerateSheetsSchema.parse(req.body ?? {});
      if (resolverId) {
        const sheets = await generationService.generateForMember(req.params.id, resolverId);
        res.status(201).json({ items: sheets, total: sheets.length });
        return;
      }
      const summary = await generationService.generateForAllMembers(req.params.id);
      res.status(201).json(summary);
    })
  );

  return router;
}
