import { evaluationQueue } from './queues.js';
import { JOB_NAMES } from './constants.js';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

/**
 * Registers the repeatable evaluation of yesterday's slate.
 * Uses upsertJobScheduler so restarts are idempotent.
 */
export async function startScheduler(): Promise<void> {
  await evaluationQueue.upsertJobScheduler(
    'evaluation:yesterday',
    { pattern: config.EVALUATION_CRON },
    {
      name: JOB_NAMES.EVALUATE_DATE,
      data: { date: 'yesterday' },
    },
  );

  logger.info({ cron: config.EVALUATION_CRON }, 'Registered evaluation scheduler');
}

export async function stopScheduler(): Promise<void> {
  await evaluationQueue.close();
}
