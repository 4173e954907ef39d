import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { evaluateDate, formatSummary, type EvaluationDeps } from '../../pipeline/evaluator.js';
import { resolveDateArg } from '../../utils/date.js';

const bodySchema = z
  .object({
    date: z.string().optional(),
  })
  .nullish();

export const evaluationsRoutes: FastifyPluginAsync<{ deps: EvaluationDeps }> = async (app, { deps }) => {
  // POST /evaluations: evaluate one date (default yesterday)
  app.post('/', async (request, reply) => {
    const body = bodySchema.safeParse(request.body);
    const date = body.success ? resolveDateArg(body.data?.date) : null;
    if (date === null) {
      return reply.code(400).send({ error: 'BadRequest', message: 'date must be YYYY-MM-DD, today or yesterday' });
    }

    const summary = await evaluateDate(date, deps);
    return { ...summary, report: formatSummary(summary) };
  });
};
