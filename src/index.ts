import { createServer } from './api/server.js';
import { startScheduler, stopScheduler } from './scheduler/index.js';
import { createEvaluationWorker } from './workers/evaluation-worker.js';
import { createEvaluationDeps } from './pipeline/context.js';
import { config } from './config.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info('Starting nba-model-ledger...');

  const deps = createEvaluationDeps();
  await deps.store.ensureStorage();

  // Register the daily evaluation, then the worker that runs it
  await startScheduler();
  const evaluationWorker = createEvaluationWorker(deps);
  logger.info('Worker started: evaluation-worker');

  const server = await createServer(deps);
  await server.listen({ port: config.PORT, host: '0.0.0.0' });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await evaluationWorker.close();
    await stopScheduler();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start');
  process.exit(1);
});
