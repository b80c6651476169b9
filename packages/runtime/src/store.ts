// Classification of failures coming back from the durable store

import { isForeignKeyViolation } from '@roadspeed/repositories';
import { RuntimeError, StoreUnavailableError } from './errors.js';

// Node socket errors and postgres.js connection errors
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

// SQLSTATE: admin/crash shutdown, cannot connect now
const UNAVAILABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Whether an error means the store could not be reached,
 * as opposed to a query the store rejected.
 */
export function isConnectionError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === undefined) return false;
  if (CONNECTION_ERROR_CODES.has(code) || UNAVAILABLE_SQLSTATES.has(code)) return true;
  // SQLSTATE class 08: connection exception
  return /^08[0-9A-Z]{3}$/.test(code);
}

export type GuardStoreOptions = {
  /** Translate a foreign key violation into a domain error */
  onForeignKeyViolation?: (error: unknown) => RuntimeError;
};

/**
 * Run a store call, translating connection failures into StoreUnavailableError.
 * Runtime errors and other store errors pass through unchanged.
 */
export async function guardStore<T>(
  operation: string,
  fn: () => Promise<T>,
  options: GuardStoreOptions = {}
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof RuntimeError) throw error;
    if (options.onForeignKeyViolation && isForeignKeyViolation(error)) {
      throw options.onForeignKeyViolation(error);
    }
    if (isConnectionError(error)) {
      throw new StoreUnavailableError(operation, error);
    }
    throw error;
  }
}
