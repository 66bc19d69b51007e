import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../../core/config.js';
import { extractHoldingsForCompany } from '../../core/holdings-engine.js';
import type { Logger } from '../../core/logger.js';
import type { SecClient } from '../../core/sec-client.js';
import { serializeRun } from '../../output/json-renderer.js';
import { errorToHttpStatus, holdingsQuerySchema, validationMessage } from '../serialization.js';

export interface HoldingsRouteDeps {
  client: SecClient;
  logger: Logger;
  config: Pick<AppConfig, 'FIXED_WIDTH_COLUMN_MARGIN'>;
}

export function registerHoldingsRoutes(server: FastifyInstance, deps: HoldingsRouteDeps) {
  server.get('/api/holdings', async (request, reply) => {
    const parsed = holdingsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: { type: 'validation', message: validationMessage(parsed.error) } });
    }
    const q = parsed.data;

    const result = await extractHoldingsForCompany({
      company: q.company,
      years: q.years,
      quarters: q.quarters,
      from: q.from,
      to: q.to,
      client: deps.client,
      logger: deps.logger,
      options: { strategies: q.strategies, columnMargin: deps.config.FIXED_WIDTH_COLUMN_MARGIN },
    });

    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send(serializeRun(result.company, result.summary, { includeRecords: q.include_records }));
  });
}
