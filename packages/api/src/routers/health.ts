// Health router - liveness and store reachability

import { StoreUnavailableError, listSegments } from '@roadspeed/runtime';
import { router, publicProcedure } from '../trpc.js';

export const healthRouter = router({
  check: publicProcedure.query(async ({ ctx }) => {
    let store: 'up' | 'down' = 'up';
    try {
      // One indexed row, whatever the size of the observation log
      await listSegments(ctx.repos, { limit: 1 });
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      ctx.logger.warn('Health check could not reach the store', { error: error.message });
      store = 'down';
    }

    return {
      status: store === 'up' ? ('ok' as const) : ('degraded' as const),
      storage: ctx.storage,
      store,
      materializer: ctx.materializer.getState(),
    };
  }),
});
