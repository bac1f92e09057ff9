/**
 * Tenant unit sync state machine.
 *
 * Enforces valid sync state transitions, producing typed errors on
 * invalid ones.
 */

import { SyncState, TenantGeoUnit, VALID_SYNC_TRANSITIONS } from '../domain/tenant-unit';
import { GeoSyncError, TypedError, syncInvalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a sync state transition. */
export function transitionSyncState(
  unitId: string,
  current: SyncState,
  target: SyncState,
): TransitionResult<SyncState> {
  const validTargets = VALID_SYNC_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return { success: false, error: syncInvalidTransitionError(unitId, current, target) };
  }
  return { success: true, newStatus: target };
}

/**
 * Walk a unit through a chain of states, e.g. `pending_sync → matched →
 * synced`, and return the final state. Throws on the first invalid step.
 */
export function advanceSyncState(unit: Pick<TenantGeoUnit, 'id' | 'syncState'>, ...targets: SyncState[]): SyncState {
  let current = unit.syncState;
  for (const target of targets) {
    const result = transitionSyncState(unit.id, current, target);
    if (!result.success || !result.newStatus) {
      throw new GeoSyncError(result.error ?? syncInvalidTransitionError(unit.id, current, target));
    }
    current = result.newStatus;
  }
  return current;
}

/** Check if a sync state ends a submission. */
export function isTerminalSyncState(state: SyncState): boolean {
  return state === SyncState.Synced || state === SyncState.Rejected;
}
