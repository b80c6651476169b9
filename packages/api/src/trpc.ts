// tRPC initialization
//
// Sets up tRPC with the superjson transformer so dates and maps survive the wire,
// and translates runtime errors into tRPC error codes.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { RuntimeError, ValidationError } from '@roadspeed/runtime';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    const cause = error.cause;
    return {
      ...shape,
      data: {
        ...shape.data,
        // Include the error codes for client-side handling
        code: error.code,
        runtimeCode: cause instanceof RuntimeError ? cause.code : null,
        field: cause instanceof ValidationError ? (cause.field ?? null) : null,
      },
    };
  },
});

type TRPCErrorCode = ConstructorParameters<typeof TRPCError>[0]['code'];

const RUNTIME_TO_TRPC: Record<string, TRPCErrorCode> = {
  VALIDATION_ERROR: 'BAD_REQUEST',
  UNKNOWN_SEGMENT: 'NOT_FOUND',
  SEGMENT_IN_USE: 'CONFLICT',
  STORE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  REFRESH_CANCELLED: 'CLIENT_CLOSED_REQUEST',
};

/**
 * Map a runtime error to the matching tRPC error, keeping it as the cause.
 */
export function toTRPCError(error: RuntimeError): TRPCError {
  return new TRPCError({
    code: RUNTIME_TO_TRPC[error.code] ?? 'INTERNAL_SERVER_ERROR',
    message: error.message,
    cause: error,
  });
}

const mapRuntimeErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok && result.error.cause instanceof RuntimeError) {
    throw toTRPCError(result.error.cause);
  }
  return result;
});

/**
 * Export router factory.
 */
export const router = t.router;

/**
 * Base procedure. Runtime errors surface with their mapped tRPC code.
 */
export const publicProcedure = t.procedure.use(mapRuntimeErrors);

/**
 * Server-side caller factory, used by tests and scripts.
 */
export const createCallerFactory = t.createCallerFactory;

/**
 * Re-export TRPCError for use in routers.
 */
export { TRPCError };
