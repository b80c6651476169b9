// Refresh policy - when the latest-speed view gets recomputed
//
// - manual:   nothing automatic; callers invoke refresh() after loading data
// - interval: refresh on start, then every intervalMs
// - on-write: refresh after writes; writes during a refresh coalesce into one follow-up

import type { RefreshPolicy } from '../config.js';
import { RefreshCancelledError } from '../errors.js';
import { silentLogger, type Logger } from '../logging.js';
import type { RefreshOptions } from './materializer.js';

/**
 * Anything that can be refreshed; normally a LatestSpeedMaterializer.
 */
export type RefreshTarget = {
  refresh(options?: RefreshOptions): Promise<unknown>;
};

export type RefreshSchedulerOptions = {
  policy: RefreshPolicy;

  /** Period for the interval policy (defaults to 60s) */
  intervalMs?: number;

  /** Logger for scheduling events and refresh failures */
  logger?: Logger;
};

export interface RefreshScheduler {
  readonly policy: RefreshPolicy;

  /** Begin scheduling. No-op for the manual policy. */
  start(): void;

  /** Stop scheduling and abort an in-flight scheduled refresh. */
  stop(): Promise<void>;

  /** Signal that observations were written. Only the on-write policy reacts. */
  notifyWrite(): void;

  isRunning(): boolean;

  /** Resolves once no scheduled refresh (or follow-up) is in flight. */
  whenIdle(): Promise<void>;
}

const DEFAULT_INTERVAL_MS = 60_000;

/**
 * Create a scheduler that drives refreshes according to a policy.
 * Refresh failures are logged, never thrown out of a timer or a write hook.
 */
export function createRefreshScheduler(
  target: RefreshTarget,
  options: RefreshSchedulerOptions
): RefreshScheduler {
  const { policy, intervalMs = DEFAULT_INTERVAL_MS, logger = silentLogger } = options;

  let running = false;
  let timer: NodeJS.Timeout | null = null;
  let current: Promise<void> | null = null;
  let controller: AbortController | null = null;
  let pending = false;

  const run = (reason: string): void => {
    if (current) {
      if (policy === 'on-write') {
        pending = true;
      } else {
        logger.debug('Skipping refresh, previous one still running', { reason });
      }
      return;
    }

    controller = new AbortController();
    logger.debug('Scheduled refresh starting', { policy, reason });

    current = target
      .refresh({ signal: controller.signal })
      .then(
        () => undefined,
        (error: unknown) => {
          if (error instanceof RefreshCancelledError) return;
          logger.error('Scheduled refresh failed', {
            policy,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      )
      .finally(() => {
        current = null;
        controller = null;
        if (pending && running) {
          pending = false;
          run('coalesced writes');
        }
      });
  };

  const whenIdle = async (): Promise<void> => {
    while (current) {
      await current;
    }
  };

  return {
    policy,

    start() {
      if (running) return;
      running = true;
      logger.info('Refresh scheduler started', { policy, intervalMs });

      if (policy === 'interval') {
        run('start');
        timer = setInterval(() => run('interval'), intervalMs);
        timer.unref();
      }
    },

    async stop() {
      if (!running) return;
      running = false;
      pending = false;

      if (timer) {
        clearInterval(timer);
        timer = null;
      }

      controller?.abort();
      await whenIdle();
      logger.info('Refresh scheduler stopped', { policy });
    },

    notifyWrite() {
      if (!running || policy !== 'on-write') return;
      run('write');
    },

    isRunning() {
      return running;
    },

    whenIdle,
  };
}
