import { z } from 'zod';
import { logger } from '../config/logger.js';
import { DomainError } from '../errors/domain-errors.js';
import type { JobStateStore } from '../services/job-persistence.service.js';
import type { QuestionSetService } from '../services/question-set.service.js';
import type { QuestionSheetGenerationService } from '../services/question-sheet-generation.service.js';
import type { QuestionSet } from '../types/models.js';
import { systemClock, type Clock } from '../utils/clock.js';

/**
 * Background job that keeps the next question set ready
 *
 * Each cycle:
 * 1. Creates the next UPCOMING set when none exists, chained to the latest set
 * 2. Fans the operating and upcoming sets out to every member (members that
 *    already have sheets are skipped)
 */

const JOB_NAME = 'question-set-publish';

const persistedConfigSchema = z
  .object({
    intervalMinutes: z.number().int().positive(),
    enabled: z.boolean(),
    fanOutOperatingSet: z.boolean(),
  })
  .partial();

export interface QuestionSetPublishConfig {
  intervalMinutes: number;
  enabled: boolean;
  fanOutOperatingSet: boolean;
}

export interface QuestionSetPublishDeps {
  questionSetService: QuestionSetService;
  generationService: QuestionSheetGenerationService;
  persistence?: JobStateStore;
  clock?: Clock;
  config?: Partial<QuestionSetPublishConfig>;
}

export interface CycleResult {
  createdQuestionSetId: string | null;
  fannedOut: string[];
  error: string | null;
}

export class QuestionSetPublishJob {
  private isRunning = false;
  private isProcessing = false;
  private intervalId: NodeJS.Timeout | null = null;
  private config: QuestionSetPublishConfig;
  private readonly clock: Clock;

  // Statistics
  private stats = {
    lastRun: null as Date | null,
    totalRuns: 0,
    totalSetsCreated: 0,
    totalSheetsMembers: 0,
    totalFailures: 0,
    lastError: null as { code: string; message: string; at: Date } | null,
  };

  constructor(private readonly deps: QuestionSetPublishDeps) {
    this.clock = deps.clock ?? systemClock;
    this.config = {
      intervalMinutes: 10,
      enabled: true,
      fanOutOperatingSet: true,
      ...deps.config,
    };
  }

  /**
   * Restore job state from the database and start it if it was running
   */
  async restore(): Promise<boolean> {
    const persistence = this.deps.persistence;
    if (!persistence) {
      return false;
    }

    await persistence.ensureJobState(JOB_NAME, this.config);
    const state = await persistence.loadState(JOB_NAME);
    if (!state) {
      logger.info('No persisted state found for question-set-publish job');
      return false;
    }

    const persistedConfig = persistedConfigSchema.safeParse(state.config);
    if (persistedConfig.success) {
      this.config = { ...this.config, ...persistedConfig.data };
    } else {
      logger.warn('Ignoring invalid persisted config for question-set-publish job', {
        issues: persistedConfig.error.errors.map((issue) => issue.message),
      });
    }

    if (state.is_running && !state.is_paused) {
      logger.info('Restoring question-set-publish job to running state');
      await this.start();
      return true;
    }
    return false;
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      isProcessing: this.isProcessing,
      config: this.config,
      stats: this.stats,
    };
  }

  async updateConfig(config: Partial<QuestionSetPublishConfig>) {
    const wasRunning = this.isRunning;

    if (wasRunning) {
      await this.stop();
    }

    this.config = {
      ...this.config,
      ...config,
    };

    await this.deps.persistence?.saveConfig(JOB_NAME, this.config);
    logger.info('Question set publish job config updated', { config: this.config });

    if (wasRunning && this.config.enabled) {
      await this.start();
    }
  }

  async start() {
    if (this.isRunning) {
      logger.warn('Question set publish job is already running');
      return;
    }

    if (!this.config.enabled) {
      logger.warn('Question set publish job is disabled');
      return;
    }

    logger.info('Starting question set publish job', { intervalMinutes: this.config.intervalMinutes });

    this.isRunning = true;
    await this.deps.persistence?.saveRunningState(JOB_NAME, true, false);

    // Run immediately on start
    void this.runOnce();

    this.intervalId = setInterval(() => {
      void this.runOnce();
    }, this.config.intervalMinutes * 60 * 1000);
  }

  async stop() {
    this.clearTimer();
    this.isRunning = false;
    await this.deps.persistence?.saveRunningState(JOB_NAME, false, false);
    logger.info('Question set publish job stopped');
  }

  /**
   * Stop the timer but keep the persisted running state, so the next start
   * of the worker resumes the job
   */
  halt() {
    this.clearTimer();
    this.isRunning = false;
    logger.info('Question set publish job halted (state preserved)');
  }

  /**
   * Run a single cycle. Never throws; failures are logged and kept in stats.
   */
  async runOnce(): Promise<CycleResult> {
    const result: CycleResult = { createdQuestionSetId: null, fannedOut: [], error: null };

    if (this.isProcessing) {
      logger.debug('Question set publish job is already processing');
      return result;
    }

    try {
      this.isProcessing = true;
      const { questionSetService, generationService } = this.deps;

      let upcoming = await questionSetService.getNextOperatingQuestionSet();
      if (!upcoming) {
        upcoming = await this.createNextQuestionSet();
        result.createdQuestionSetId = upcoming.id;
      }

      const targets: QuestionSet[] = [];
      if (this.config.fanOutOperatingSet) {
        const operating = await questionSetService.getOperatingQuestionSet();
        if (operating) targets.push(operating);
      }
      targets.push(upcoming);

      for (const questionSet of targets) {
        const summary = await generationService.generateForAllMembers(questionSet.id);
        this.stats.totalSheetsMembers += summary.created;
        result.fannedOut.push(questionSet.id);
      }
    } catch (error) {
      this.stats.totalFailures++;
      const code = error instanceof DomainError ? error.code : 'UNEXPECTED';
      const message = error instanceof Error ? error.message : String(error);
      this.stats.lastError = { code, message, at: this.clock() };
      result.error = code;
      logger.error('Error in question set publish cycle', { error, code });
    } finally {
      this.stats.lastRun = this.clock();
      this.stats.totalRuns++;
      this.isProcessing = false;
      await this.deps.persistence?.saveStats(JOB_NAME, this.stats);
    }

    return result;
  }

  private async createNextQuestionSet(): Promise<QuestionSet> {
    const { questionSetService } = this.deps;
    const latest = await questionSetService.getLatestPublishedQuestionSet();

    // A chain whose last window already closed restarts from the daily schedule,
    // still excluding the questions of that last set
    const stale = latest !== null && latest.endAt.getTime() <= this.clock().getTime();

    const questionSetId = await questionSetService.createQuestionSet(latest, { scheduleFromNow: stale });
    this.stats.totalSetsCreated++;

    const created = await questionSetService.getQuestionSetById(questionSetId);
    if (!created) {
      throw new Error(`Question set ${questionSetId} was not found after creation`);
    }
    return created;
  }

  private clearTimer() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }
}
