import type { FastifyInstance } from 'fastify';
import { getCacheStats } from '../../core/cache.js';
import { STRATEGY_DESCRIPTIONS } from '../../core/extraction-chain.js';
import { STRATEGY_ORDER } from '../../core/types.js';

export function registerMetaRoutes(server: FastifyInstance) {
  server.get('/api/strategies', async () => {
    return {
      strategies: STRATEGY_ORDER.map((name, i) => ({
        order: i + 1,
        name,
        description: STRATEGY_DESCRIPTIONS[name],
      })),
    };
  });

  server.get('/api/cache-stats', async () => {
    const stats = getCacheStats();
    return {
      entries: stats.entries,
      size_bytes: stats.sizeBytes,
      size_mb: (stats.sizeBytes / 1024 / 1024).toFixed(1),
    };
  });
}
