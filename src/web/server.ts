#!/usr/bin/env node

/**
 * JSON API server for edgar-13f-holdings.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 */

import { getConfig } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { SecClient } from '../core/sec-client.js';
import { buildServer } from './app.js';

const config = getConfig();
const logger = createLogger(config);
const client = new SecClient({
  logger,
  userAgent: config.SEC_USER_AGENT,
  requestsPerSecond: config.SEC_REQUESTS_PER_SECOND,
});

const server = buildServer({ client, logger, config });

const port = parseInt(process.env.PORT || '3005', 10);
await server.listen({ port, host: '0.0.0.0' });

logger.info({ port }, 'edgar-13f-holdings API listening');
console.log(`
  edgar-13f-holdings API
  http://localhost:${port}/api/strategies

  Press Ctrl+C to stop
`);
