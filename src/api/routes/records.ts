import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { LedgerStore } from '../../ledger/csv-store.js';
import { logManualRecord } from '../../pipeline/manual-entry.js';

const querySchema = z.object({
  allowDuplicate: z.enum(['true', 'false']).optional(),
});

export const recordsRoutes: FastifyPluginAsync<{ store: LedgerStore }> = async (app, { store }) => {
  // POST /records: one hand-entered correction
  app.post('/', async (request, reply) => {
    const query = querySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'BadRequest', message: 'allowDuplicate must be true or false' });
    }

    const result = await logManualRecord(request.body, store, {
      allowDuplicate: query.data.allowDuplicate === 'true',
    });

    return reply.code(result.status === 'written' ? 201 : 409).send(result);
  });
};
