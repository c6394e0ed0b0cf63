/**
 * HTTP server entrypoint for the planner gateway.
 *
 * This file:
 * - Loads configuration
 * - Wires runtime dependencies and creates the Express app
 * - Starts listening on the configured port
 */
import { createServer } from 'http';
import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

const deps = buildRuntimeDeps();
const app = createApp({
  planningService: deps.planningService,
  failureLocale: deps.failureLocale,
});
const server = createServer(app);

server.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      env: config.env,
    },
    'Planner gateway started',
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
