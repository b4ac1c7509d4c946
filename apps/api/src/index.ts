import { serve } from '@hono/node-server';
import { logger } from '@gatehouse/observability';
import { createApp } from './app.js';
import { ConfigError, describeConfig, loadConfig, type AppConfig } from './config.js';
import { createServices } from './services/index.js';

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Invalid configuration');
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfigOrExit();
const services = createServices(config);
const app = createApp(services);

services.logger.info({ config: describeConfig(config) }, 'Starting server');

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  services.logger.info({ port: info.port }, 'Server running');
});

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  services.logger.info({ signal }, 'Shutting down');

  // Ending the SSE streams first lets the server finish its open requests
  await services.broadcaster.close();
  await closeServer();
  await services.close();
  services.logger.info('Server stopped');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        services.logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  });
}
