/**
 * Geography Ingest Service.
 *
 * The boundary tenants submit units through. A submission is validated
 * against the tenant's own hierarchy, persisted as a draft, and synced:
 * matched against the canonical registry and then linked, created or
 * parked for review.
 */

import { v4 as uuid } from 'uuid';
import { ConflictCase, Resolution } from '../domain/conflict';
import {
  DuplicateCreateRace,
  GeoSyncError,
  SyncPersistenceError,
  TypedError,
  conflictUnresolvedError,
  createTypedError,
  notFoundError,
  validationError,
} from '../domain/errors';
import { IngestAck, SubmitUnitInput, SyncState, TenantGeoUnit } from '../domain/tenant-unit';
import { advanceSyncState } from '../engine/state-machine';
import { ConflictDetector } from '../conflicts/conflict-detector';
import { GeoSyncConfig } from '../config';
import { Logger, logger as rootLogger } from '../logger';
import { CanonicalMatcher } from '../matching/canonical-matcher';
import { foldName, normalizeName, pickPrimaryName } from '../matching/normalize';
import { CanonicalRegistry } from '../registry/canonical-registry';
import { SYSTEM_ACTOR } from '../ledger/sync-ledger';
import { runAtomic } from '../storage/atomic';
import { ListOptions, Store } from '../storage/store';
import { validateHierarchy } from './hierarchy';

/** Where the unit's canonical counterpart belongs. */
type CanonicalPlacement = { known: true; parentCanonicalId: string | null } | { known: false };

export interface SyncBatchResult {
  synced: IngestAck[];
  failed: Array<{ unitId: string; error: TypedError }>;
}

export interface ConflictResolutionResult {
  conflict: ConflictCase;
  /** State of the case's tenant unit after resolution (and re-sync), if it has one. */
  ack: IngestAck | null;
}

export class GeographyIngestService {
  private log: Logger;
  private inFlight = new Map<string, Promise<IngestAck>>();

  constructor(
    private store: Store,
    private matcher: CanonicalMatcher,
    private registry: CanonicalRegistry,
    private conflicts: ConflictDetector,
    private config: GeoSyncConfig,
    log: Logger = rootLogger,
  ) {
    this.log = log.child('ingest');
  }

  /**
   * Accept a tenant unit. Resubmitting a name the tenant already has at the
   * same position returns the existing unit.
   */
  async submit(input: SubmitUnitInput): Promise<IngestAck> {
    if (!input.tenantId.trim()) {
      throw new GeoSyncError(validationError('tenantId must not be blank'));
    }
    const primaryName = pickPrimaryName(input.names, this.config.defaultLocale);
    if (primaryName === null || foldName(primaryName) === '') {
      throw new GeoSyncError(
        validationError('At least one declared name must contain a letter or digit', { names: input.names }),
      );
    }
    const normalizedName = normalizeName(primaryName, this.config.matching.noiseWords);

    const { unit, deduplicated } = await runAtomic(this.store, { operation: 'submit', log: this.log }, async (tx) => {
      await validateHierarchy(tx.tenantUnits, input, this.config.hierarchy.maxLevel);

      const existing = await tx.tenantUnits.findByName(input.tenantId, input.level, input.parentId, normalizedName);
      if (existing) return { unit: existing, deduplicated: true };

      const now = new Date().toISOString();
      const created = await tx.tenantUnits.create({
        id: `tgu_${uuid()}`,
        tenantId: input.tenantId,
        level: input.level,
        parentId: input.parentId,
        names: input.names,
        primaryName,
        normalizedName,
        governmentCode: input.governmentCode,
        canonicalId: null,
        syncState: SyncState.Draft,
        retired: false,
        createdAt: now,
        updatedAt: now,
      });
      return { unit: created, deduplicated: false };
    });

    if (deduplicated) {
      this.log.info('Duplicate submission', { unitId: unit.id, tenantId: unit.tenantId, name: primaryName });
      return this.ackFor(unit, true);
    }

    this.log.info('Unit submitted', {
      unitId: unit.id,
      tenantId: unit.tenantId,
      level: unit.level,
      name: primaryName,
    });
    if (this.config.sync.mode === 'immediate') {
      return this.sync(unit.id);
    }
    return this.ackFor(unit, false);
  }

  /**
   * Match a unit against the registry and apply the decision. A lost create
   * race re-runs the match, which then finds the winner.
   */
  async sync(unitId: string): Promise<IngestAck> {
    // One sync per unit at a time; a second caller shares the running one.
    const running = this.inFlight.get(unitId);
    if (running) return running;
    const attempt = this.syncWithRetry(unitId).finally(() => this.inFlight.delete(unitId));
    this.inFlight.set(unitId, attempt);
    return attempt;
  }

  private async syncWithRetry(unitId: string): Promise<IngestAck> {
    const attempts = this.config.sync.maxCreateAttempts;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.syncOnce(unitId);
      } catch (err) {
        if (!(err instanceof DuplicateCreateRace)) throw err;
        if (attempt >= attempts) {
          this.log.error('Create race not settled', { unitId, attempts, key: err.key });
          throw new SyncPersistenceError(`Could not settle a concurrent create after ${attempts} attempts`, unitId, err);
        }
        this.log.warn('Create race lost; matching again', { unitId, attempt, existingId: err.existingId });
      }
    }
  }

  /**
   * Sync every draft, and every unit a failed sync left in pending_sync,
   * shallowest level first so parents are linked before their children.
   * Domain failures are collected, not thrown.
   */
  async syncPending(): Promise<SyncBatchResult> {
    const queued = [
      ...(await this.store.tenantUnits.listBySyncState(SyncState.Draft)),
      ...(await this.store.tenantUnits.listBySyncState(SyncState.PendingSync)),
    ];
    queued.sort((a, b) => a.level - b.level);
    const result: SyncBatchResult = { synced: [], failed: [] };
    for (const unit of queued) {
      try {
        result.synced.push(await this.sync(unit.id));
      } catch (err) {
        if (!(err instanceof GeoSyncError)) throw err;
        this.log.warn('Pending unit failed to sync', { unitId: unit.id, code: err.typedError.code });
        result.failed.push({ unitId: unit.id, error: err.typedError });
      }
    }
    this.log.info('Pending units synced', { synced: result.synced.length, failed: result.failed.length });
    return result;
  }

  /** Apply an administrator's resolution; a re-parented unit is synced again. */
  async resolveConflict(caseId: string, resolution: Resolution, actorId: string): Promise<ConflictResolutionResult> {
    const outcome = await this.conflicts.resolve(caseId, resolution, actorId);
    if (!outcome.unit) return { conflict: outcome.conflict, ack: null };
    const ack = outcome.requeue ? await this.sync(outcome.unit.id) : await this.ackFor(outcome.unit, false);
    if (ack.canonicalId !== null) await this.releaseWaitingChildren(outcome.unit.id);
    return { conflict: outcome.conflict, ack };
  }

  /**
   * Children parked because this unit had no canonical link are matched
   * again under the parent's canonical unit.
   */
  private async releaseWaitingChildren(parentId: string): Promise<void> {
    const children = await this.store.tenantUnits.listChildren(parentId);
    for (const child of children) {
      if (child.syncState !== SyncState.ConflictOpen) continue;
      const waiting = await this.conflicts.findOpenForUnit(child.id);
      if (!waiting || waiting.reason !== 'parent-unreconciled') continue;

      this.log.info('Parent reconciled; matching child again', { unitId: child.id, caseId: waiting.id });
      try {
        await this.resolveConflict(waiting.id, { action: 'reassign-parent', parentId }, SYSTEM_ACTOR);
      } catch (err) {
        if (!(err instanceof GeoSyncError)) throw err;
        this.log.warn('Child stays in review', { unitId: child.id, caseId: waiting.id, code: err.typedError.code });
      }
    }
  }

  /**
   * Soft-retire a tenant unit. Units with active children stay; canonical
   * tenant counts are not decremented.
   */
  async retireUnit(unitId: string): Promise<TenantGeoUnit> {
    return runAtomic(this.store, { operation: 'retireUnit', unitId, log: this.log }, async (tx) => {
      const unit = await tx.tenantUnits.getById(unitId);
      if (!unit) throw new GeoSyncError(notFoundError('Tenant unit', unitId));
      if (unit.retired) return unit;

      const children = await tx.tenantUnits.listChildren(unitId);
      if (children.length > 0) {
        throw new GeoSyncError(
          createTypedError({
            code: 'HIERARCHY.HAS_CHILDREN',
            message: `Unit ${unitId} has ${children.length} active child unit(s)`,
            unitId,
            details: { childIds: children.map((c) => c.id) },
            suggestedFixes: [{ type: 'RETIRE_CHILDREN', params: { childIds: children.map((c) => c.id) } }],
          }),
        );
      }

      const retired = await tx.tenantUnits.update(unitId, { retired: true });
      if (!retired) throw new GeoSyncError(notFoundError('Tenant unit', unitId));
      this.log.info('Unit retired', { unitId, tenantId: unit.tenantId });
      return retired;
    });
  }

  async getUnit(unitId: string): Promise<TenantGeoUnit | null> {
    return this.store.tenantUnits.getById(unitId);
  }

  async listTenantUnits(tenantId: string, options?: ListOptions): Promise<TenantGeoUnit[]> {
    return this.store.tenantUnits.listByTenant(tenantId, options);
  }

  /** Acknowledgement for a unit's current state. */
  async ackFor(unit: TenantGeoUnit, deduplicated: boolean): Promise<IngestAck> {
    const conflict = unit.syncState === SyncState.ConflictOpen ? await this.conflicts.findOpenForUnit(unit.id) : null;
    return {
      unitId: unit.id,
      syncState: unit.syncState,
      canonicalId: unit.canonicalId,
      conflictCaseId: conflict?.id ?? null,
      deduplicated,
      notice: conflict ? conflictUnresolvedError(conflict.id, unit.id) : undefined,
    };
  }

  private async syncOnce(unitId: string): Promise<IngestAck> {
    const unit = await this.markPending(unitId);
    if (unit.syncState === SyncState.ConflictOpen) {
      // Already awaiting review; the case decides what happens next.
      return this.ackFor(unit, false);
    }

    const placement = await this.placementOf(unit);
    const candidates = await this.matcher.findCandidates(
      unit,
      placement.known ? placement.parentCanonicalId : undefined,
    );
    const decision = this.matcher.decide(candidates, { parentKnown: placement.known });

    switch (decision.kind) {
      case 'link': {
        const { unit: linked } = await this.registry.linkTenantUnit(
          unit,
          decision.candidate.canonicalId,
          decision.candidates,
          decision.candidate.score,
        );
        return this.ackFor(linked, false);
      }
      case 'create': {
        // decide() only returns create when the placement is known.
        const parentCanonicalId = placement.known ? placement.parentCanonicalId : null;
        const { unit: linked } = await this.registry.createFromTenantUnit(unit, parentCanonicalId, decision.candidates);
        return this.ackFor(linked, false);
      }
      case 'conflict': {
        const conflict = await this.conflicts.open(
          unit,
          decision.candidates,
          decision.reason,
          placement.known ? placement.parentCanonicalId : null,
        );
        return {
          unitId: unit.id,
          syncState: SyncState.ConflictOpen,
          canonicalId: unit.canonicalId,
          conflictCaseId: conflict.id,
          deduplicated: false,
          notice: conflictUnresolvedError(conflict.id, unit.id),
        };
      }
    }
  }

  /** Move the unit to pending_sync unless it already is there or awaits review. */
  private async markPending(unitId: string): Promise<TenantGeoUnit> {
    return runAtomic(this.store, { operation: 'sync', unitId, log: this.log }, async (tx) => {
      const unit = await tx.tenantUnits.getById(unitId);
      if (!unit) throw new GeoSyncError(notFoundError('Tenant unit', unitId));
      if (unit.retired) {
        throw new GeoSyncError(validationError(`Unit is retired: ${unitId}`, { unitId }));
      }
      if (unit.syncState === SyncState.PendingSync || unit.syncState === SyncState.ConflictOpen) {
        return unit;
      }
      const syncState = advanceSyncState(unit, SyncState.PendingSync);
      const pending = await tx.tenantUnits.update(unitId, { syncState });
      if (!pending) throw new GeoSyncError(notFoundError('Tenant unit', unitId));
      return pending;
    });
  }

  /** The canonical parent to search and create under, when the tenant parent is linked. */
  private async placementOf(unit: TenantGeoUnit): Promise<CanonicalPlacement> {
    if (unit.parentId === null) return { known: true, parentCanonicalId: null };
    const parent = await this.store.tenantUnits.getById(unit.parentId);
    if (!parent?.canonicalId) return { known: false };
    const canonical = await this.registry.resolveActive(parent.canonicalId);
    return canonical ? { known: true, parentCanonicalId: canonical.id } : { known: false };
  }
}
