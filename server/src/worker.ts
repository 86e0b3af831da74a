import { env } from './config/env.js';
import { formatTimeOfDay } from './config/question-set.config.js';
import { logger } from './config/logger.js';
import { createContainer } from './container.js';
import { db, disconnect } from './db/client.js';

/**
 * Worker process for the question set publish job
 * Run with RUN_MODE=worker
 */

async function startWorker() {
  logger.info('Starting question set worker');
  logger.info(`Environment: ${env.NODE_ENV}`);
  logger.info('Question set schedule', {
    size: env.questionSet.size,
    friendRatio: env.questionSet.friendRatio,
    openTime1: formatTimeOfDay(env.questionSet.openTime1),
    openTime2: formatTimeOfDay(env.questionSet.openTime2),
  });

  const { questionSetPublishJob } = createContainer(db, env.questionSet, {
    intervalMinutes: env.PUBLISH_JOB_INTERVAL_MINUTES,
  });

  // Halt timers but keep the persisted running state, so the job resumes on restart
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    questionSetPublishJob.halt();
    disconnect()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Error closing database pool', { error });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  const restored = await questionSetPublishJob.restore();
  if (!restored) {
    await questionSetPublishJob.start();
  }
  logger.info('Question set publish job running', questionSetPublishJob.getStatus().config);
}

startWorker().catch((error) => {
  logger.error('Worker failed to start', { error });
  process.exit(1);
});
