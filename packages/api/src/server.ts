// Standalone HTTP entry point
//
// Usage:
//   npm start                       -> in-memory storage
//   DATABASE_URL=... npm start      -> Postgres

import { createHTTPServer } from '@trpc/server/adapters/standalone';
import { ConfigError, loadConfig } from '@roadspeed/runtime';
import { appRouter } from './routers/index.js';
import { createAppContext } from './context.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const app = createAppContext(config);

  app.scheduler.start();
  // The interval policy refreshes on start; otherwise warm the view once here
  if (config.refreshPolicy !== 'interval') {
    await app.materializer.refresh();
  }

  const server = createHTTPServer({
    router: appRouter,
    createContext: () => app,
    onError({ error, path }) {
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        app.logger.error('Request failed', { path, error: error.message });
      }
    },
  });

  server.listen(config.port);
  app.logger.info('API listening', { port: config.port, storage: app.storage });

  const shutdown = (signal: string) => {
    app.logger.info('Shutting down', { signal });
    server.close();
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        app.logger.error('Shutdown failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[ERROR] ${error.message}`, error.fieldErrors);
  } else {
    console.error('[ERROR] Failed to start', error);
  }
  process.exit(1);
});
