/**
 * Atomic units of work.
 *
 * A registry write and the ledger entry describing it commit together. Any
 * failure that is not already a typed domain error (a failed ledger append,
 * a store fault) becomes a retryable SyncPersistenceError.
 */

import { GeoSyncError, SyncPersistenceError } from '../domain/errors';
import { Logger } from '../logger';
import { Store } from './store';

export interface AtomicOptions {
  operation: string;
  unitId?: string;
  log: Logger;
}

export async function runAtomic<T>(
  handle: Store,
  options: AtomicOptions,
  fn: (tx: Store) => Promise<T>,
): Promise<T> {
  try {
    return await handle.transaction(fn);
  } catch (err) {
    if (err instanceof GeoSyncError) throw err;
    options.log.error('Atomic unit failed; changes discarded', {
      operation: options.operation,
      unitId: options.unitId,
      error: err instanceof Error ? err.message : String(err),
    });
    throw new SyncPersistenceError(`${options.operation} failed and was rolled back`, options.unitId, err);
  }
}
