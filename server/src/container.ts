import type { QuestionSetConfig } from './config/question-set.config.js';
import type { Queryable } from './db/types.js';
import { QuestionSetPublishJob, type QuestionSetPublishConfig } from './jobs/question-set-publish.job.js';
import { PgMemberRelationRepository } from './repositories/member-relation.repository.js';
import { PgMemberRepository } from './repositories/member.repository.js';
import { PgQuestionSetRepository } from './repositories/question-set.repository.js';
import { PgQuestionSheetRepository } from './repositories/question-sheet.repository.js';
import { PgQuestionRepository } from './repositories/question.repository.js';
import { JobPersistenceService } from './services/job-persistence.service.js';
import { MemberRelationService } from './services/member-relation.service.js';
import { MemberService } from './services/member.service.js';
import { QuestionSetService } from './services/question-set.service.js';
import { QuestionSheetGenerationService } from './services/question-sheet-generation.service.js';
import { QuestionSheetService } from './services/question-sheet.service.js';
import { QuestionService } from './services/question.service.js';
import type { AppServices } from './app.js';

export interface Container extends AppServices {
  questionSetPublishJob: QuestionSetPublishJob;
}

/**
 * Wire repositories, services and the publish job over one Queryable
 */
export function createContainer(
  db: Queryable,
  questionSetConfig: QuestionSetConfig,
  jobConfig: Partial<QuestionSetPublishConfig> = {}
): Container {
  const questionRepository = new PgQuestionRepository(db);
  const questionSetRepository = new PgQuestionSetRepository(db);
  const questionSheetRepository = new PgQuestionSheetRepository(db);
  const memberRepository = new PgMemberRepository(db);
  const memberRelationRepository = new PgMemberRelationRepository(db);

  const questionService = new QuestionService(questionRepository);
  const questionSetService = new QuestionSetService({
    questionRepository,
    questionSetRepository,
    config: questionSetConfig,
  });
  const questionSheetService = new QuestionSheetService(questionRepository, questionSheetRepository);
  const memberRelationService = new MemberRelationService(memberRelationRepository, memberRepository);
  const memberService = new MemberService(memberRepository, memberRelationService);
  const generationService = new QuestionSheetGenerationService({
    questionSetService,
    questionSheetService,
    memberRelationService,
    memberService,
    candidatePoolSize: questionSetConfig.candidatePoolSize,
  });

  const questionSetPublishJob = new QuestionSetPublishJob({
    questionSetService,
    generationService,
    persistence: new JobPersistenceService(db),
    config: jobConfig,
  });

  return {
    questionService,
    questionSetService,
    questionSheetService,
    generationService,
    memberService,
    memberRelationService,
    questionSetPublishJob,
  };
}
