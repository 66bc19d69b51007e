import type { FastifyInstance } from 'fastify';
import { listFilingsForCompany } from '../../core/holdings-engine.js';
import type { SecClient } from '../../core/sec-client.js';
import { serializeFilingList } from '../../output/filing-renderer.js';
import { errorToHttpStatus, filingsQuerySchema, validationMessage } from '../serialization.js';

export function registerFilingsRoutes(server: FastifyInstance, client: SecClient) {
  server.get('/api/filings', async (request, reply) => {
    const parsed = filingsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: { type: 'validation', message: validationMessage(parsed.error) } });
    }

    const result = await listFilingsForCompany(client, parsed.data.company);
    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send(serializeFilingList(result));
  });
}
