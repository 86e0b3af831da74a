import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { logger } from './config/logger.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import type { MemberRelationService } from './services/member-relation.service.js';
import type { MemberService } from './services/member.service.js';
import type { QuestionSetService } from './services/question-set.service.js';
import type { QuestionSheetGenerationService } from './services/question-sheet-generation.service.js';
import type { QuestionSheetService } from './services/question-sheet.service.js';
import type { QuestionService } from './services/question.service.js';

// Import routes
import { createMemberRouter } from './routes/member.js';
import { createQuestionRouter } from './routes/question.js';
import { createQuestionSetRouter } from './routes/question-set.js';
import { createRelationRouter } from './routes/relation.js';

export interface AppServices {
  questionService: QuestionService;
  questionSetService: QuestionSetService;
  questionSheetService: QuestionSheetService;
  generationService: QuestionSheetGenerationService;
  memberService: MemberService;
  memberRelationService: MemberRelationService;
}

export function createApp(services: AppServices) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, {
      query: req.query,
    });
    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.use('/api/questions', createQuestionRouter(services.questionService));
  app.use(
    '/api/question-sets',
    createQuestionSetRouter({
      questionSetService: services.questionSetService,
      questionSheetService: services.questionSheetService,
      generationService: services.generationService,
    })
  );
  app.use('/api/members', createMemberRouter(services.memberService));
  app.use('/api/relations', createRelationRouter(services.memberRelationService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
