// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { createServer } from './server.js';

const { app, config } = createServer();
const { host, port } = config;

// This helper closes the listener so in-flight requests and open event streams finish before exit.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');
  await app.close();
  app.log.info({ signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host, port })
  .then(() => {
    app.log.info({ host, port }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error) }, 'server_start_failed');
    process.exit(1);
  });
