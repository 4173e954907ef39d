import { Worker, type Job } from 'bullmq';
import { config } from '../config.js';
import { QUEUE_NAMES, type EvaluationJobData } from '../scheduler/constants.js';
import { evaluateDate, formatSummary, type EvaluationDeps } from '../pipeline/evaluator.js';
import { resolveDateArg } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };

export function createEvaluationWorker(deps: EvaluationDeps) {
  const worker = new Worker<EvaluationJobData>(
    QUEUE_NAMES.EVALUATION,
    async (job: Job<EvaluationJobData>) => {
      const date = resolveDateArg(job.data.date);
      if (date === null) {
        throw new Error(`Invalid evaluation date: ${job.data.date}`);
      }

      const summary = await evaluateDate(date, deps);
      logger.child({ job: job.id, date }).info(formatSummary(summary));
      return { written: summary.written, skipped: summary.skipped.length, failed: summary.failed.length };
    },
    // the ledger has a single writer
    { connection, concurrency: 1 },
  );

  worker.on('failed', (job, err) => {
    logger.error({ job: job?.id, err: err.message }, 'Evaluation job failed');
  });

  return worker;
}
