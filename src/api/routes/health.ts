import type { FastifyPluginAsync } from 'fastify';
import type { LedgerStore } from '../../ledger/csv-store.js';

export const healthRoutes: FastifyPluginAsync<{ store: LedgerStore }> = async (app, { store }) => {
  app.get('/health', async () => {
    const ledgerOk = await store.keys().then(
      () => true,
      () => false,
    );
    return {
      status: ledgerOk ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services: {
        ledger: ledgerOk ? 'up' : 'down',
      },
    };
  });
};
