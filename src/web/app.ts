import Fastify, { type FastifyInstance } from 'fastify';
import type { AppConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import type { SecClient } from '../core/sec-client.js';
import { registerFilingsRoutes } from './routes/filings.js';
import { registerHoldingsRoutes } from './routes/holdings.js';
import { registerMetaRoutes } from './routes/meta.js';
import { classifyError, errorToHttpStatus } from './serialization.js';

export interface ServerDeps {
  client: SecClient;
  logger: Logger;
  config: Pick<AppConfig, 'FIXED_WIDTH_COLUMN_MARGIN'>;
}

/** JSON API over the extraction engine; listening is left to the caller */
export function buildServer(deps: ServerDeps): FastifyInstance {
  const server = Fastify({ logger: false });

  registerHoldingsRoutes(server, deps);
  registerFilingsRoutes(server, deps.client);
  registerMetaRoutes(server);

  server.setErrorHandler((error: Error, request, reply) => {
    const classified = classifyError(error);
    deps.logger.error({ err: error, url: request.url }, 'request failed');
    reply.status(errorToHttpStatus(classified.type)).send({ error: classified });
  });

  return server;
}
