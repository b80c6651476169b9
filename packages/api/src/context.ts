// Application context
//
// Built once per process and shared by every request. Storage is chosen the
// same way everywhere:
// - In-memory (default): no setup required, data is lost on restart
// - Postgres: set DATABASE_URL

import { postgres, memory, type RepositoryContext } from '@roadspeed/repositories';
import {
  createConsoleLogger,
  createLatestSpeedMaterializer,
  createRefreshScheduler,
  silentLogger,
  type Config,
  type LatestSpeedMaterializer,
  type Logger,
  type RefreshScheduler,
} from '@roadspeed/runtime';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  /** Repository context for data access */
  repos: RepositoryContext;

  /** Latest-speed view served by the `latest` router */
  materializer: LatestSpeedMaterializer;

  /** Drives refreshes according to the configured policy */
  scheduler: RefreshScheduler;

  logger: Logger;
  config: Config;

  /** Which backend `repos` talks to; external when repositories were passed in */
  storage: 'memory' | 'postgres' | 'external';
};

export type AppContext = Context & {
  /** Stop the scheduler and release the database connection */
  close(): Promise<void>;
};

export type CreateAppContextOptions = {
  /** Use these repositories instead of choosing from config */
  repos?: RepositoryContext;
  logger?: Logger;
};

function loggerFor(config: Config): Logger {
  return config.logLevel === 'silent' ? silentLogger : createConsoleLogger(config.logLevel);
}

/**
 * Create the application context from configuration.
 *
 * @example
 * ```ts
 * const app = createAppContext(loadConfig());
 * app.scheduler.start();
 * // ...
 * await app.close();
 * ```
 */
export function createAppContext(
  config: Config,
  options: CreateAppContextOptions = {}
): AppContext {
  const logger = options.logger ?? loggerFor(config);

  let repos: RepositoryContext;
  let storage: Context['storage'];
  let closeStore: () => Promise<void> = async () => {};

  if (options.repos) {
    repos = options.repos;
    storage = 'external';
  } else if (config.databaseUrl) {
    const { db, client } = postgres.createDatabase({
      connectionString: config.databaseUrl,
      maxConnections: config.databaseMaxConnections,
    });
    repos = postgres.createPgRepositoryContext(db);
    storage = 'postgres';
    closeStore = async () => {
      await client.end();
    };
  } else {
    repos = memory.createInMemoryRepositoryContext();
    storage = 'memory';
    logger.info('Using in-memory storage');
  }

  const materializer = createLatestSpeedMaterializer(repos, { logger });
  const scheduler = createRefreshScheduler(materializer, {
    policy: config.refreshPolicy,
    intervalMs: config.refreshIntervalMs,
    logger,
  });

  return {
    repos,
    materializer,
    scheduler,
    logger,
    config,
    storage,
    async close() {
      await scheduler.stop();
      await closeStore();
    },
  };
}
