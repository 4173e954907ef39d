import Fastify from 'fastify';
import { healthRoutes } from './routes/health.js';
import { recordsRoutes } from './routes/records.js';
import { evaluationsRoutes } from './routes/evaluations.js';
import type { EvaluationDeps } from '../pipeline/evaluator.js';
import {
  OutcomeFetchError,
  PersistenceError,
  PredictionInputError,
  ValidationError,
} from '../errors.js';
import { logger } from '../utils/logger.js';

function statusFor(err: Error & { statusCode?: number }): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof PredictionInputError) return 422;
  if (err instanceof OutcomeFetchError) return 502;
  if (err instanceof PersistenceError) return 503;
  return err.statusCode ?? 500;
}

export async function createServer(deps: EvaluationDeps) {
  const app = Fastify({ loggerInstance: logger });

  app.setErrorHandler(async (err, request, reply) => {
    const status = statusFor(err);
    if (status >= 500) request.log.error({ err }, 'Request failed');
    return reply.code(status).send({
      error: err.name,
      message: err.message,
      ...(err instanceof ValidationError ? { field: err.field } : {}),
    });
  });

  await app.register(healthRoutes, { store: deps.store });
  await app.register(recordsRoutes, { prefix: '/records', store: deps.store });
  await app.register(evaluationsRoutes, { prefix: '/evaluations', deps });

  return app;
}
