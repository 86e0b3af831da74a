/**
 * Job Persistence Service
 *
 * Saves and loads background job state so a job that was running before a
 * restart resumes with the same configuration.
 */

import { logger } from '../config/logger.js';
import type { Queryable } from '../db/types.js';

export interface JobState {
  job_name: string;
  is_running: boolean;
  is_paused: boolean;
  config: Record<string, unknown>;
  stats: Record<string, unknown>;
  last_started_at: Date | null;
  last_stopped_at: Date | null;
  last_run_at: Date | null;
}

export interface JobStateStore {
  ensureJobState(jobName: string, config: object): Promise<void>;
  loadState(jobName: string): Promise<JobState | null>;
  saveRunningState(jobName: string, isRunning: boolean, isPaused?: boolean): Promise<void>;
  saveConfig(jobName: string, config: object): Promise<void>;
  saveStats(jobName: string, stats: object): Promise<void>;
}

export class JobPersistenceService implements JobStateStore {
  constructor(private readonly db: Queryable) {}

  /**
   * Create the state row if it does not exist yet
   */
  async ensureJobState(jobName: string, config: object): Promise<void> {
    await this.db.query(
      `INSERT INTO job_state (job_name, config)
       VALUES ($1, $2)
       ON CONFLICT (job_name) DO NOTHING`,
      [jobName, JSON.stringify(config)]
    );
  }

  async loadState(jobName: string): Promise<JobState | null> {
    try {
      const result = await this.db.query<JobState>(`SELECT * FROM job_state WHERE job_name = $1`, [jobName]);
      if (result.rows.length === 0) {
        return null;
      }
      return result.rows[0];
    } catch (error) {
      logger.error('Failed to load job state', { jobName, error });
      return null;
    }
  }

  async saveRunningState(jobName: string, isRunning: boolean, isPaused: boolean = false): Promise<void> {
    try {
      const timestamp = isRunning ? 'last_started_at = NOW()' : 'last_stopped_at = NOW()';

      await this.db.query(
        `UPDATE job_state SET
          is_running = $2,
          is_paused = $3,
          ${timestamp}
         WHERE job_name = $1`,
        [jobName, isRunning, isPaused]
      );

      logger.info('Job running state saved', { jobName, isRunning, isPaused });
    } catch (error) {
      logger.error('Failed to save job running state', { jobName, error });
    }
  }

  async saveConfig(jobName: string, config: object): Promise<void> {
    try {
      await this.db.query(`UPDATE job_state SET config = $2 WHERE job_name = $1`, [jobName, JSON.stringify(config)]);
      logger.info('Job config saved', { jobName, config });
    } catch (error) {
      logger.error('Failed to save job config', { jobName, error });
    }
  }

  async saveStats(jobName: string, stats: object): Promise<void> {
    try {
      await this.db.query(`UPDATE job_state SET stats = $2, last_run_at = NOW() WHERE job_name = $1`, [
        jobName,
        JSON.stringify(stats),
      ]);
    } catch (error) {
      logger.error('Failed to save job stats', { jobName, error });
    }
  }
}
