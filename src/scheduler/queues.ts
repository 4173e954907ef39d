import { Queue } from 'bullmq';
import { config } from '../config.js';
import { QUEUE_NAMES, type EvaluationJobData } from './constants.js';

const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };

// One attempt per job: re-running a date is idempotent, and the schedule itself
// comes back around to pick up late odds.
export const evaluationQueue = new Queue<EvaluationJobData>(QUEUE_NAMES.EVALUATION, {
  connection,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: { count: 500 },
    removeOnFail: { count: 1000 },
  },
});
