// @roadspeed/api
// tRPC API over the road speed runtime

export { appRouter, type AppRouter } from './routers/index.js';
export {
  createAppContext,
  type AppContext,
  type Context,
  type CreateAppContextOptions,
} from './context.js';
export { router, publicProcedure, createCallerFactory, toTRPCError, TRPCError } from './trpc.js';
