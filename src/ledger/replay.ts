/**
 * Ledger replay.
 *
 * Rebuilds canonical units by re-applying recorded decisions in sequence
 * order. Used for disaster recovery, for moving the registry to a new
 * matching algorithm, and to check the live registry against its history.
 */

import { CanonicalUnit } from '../domain/canonical-unit';
import { SyncLedgerEntry } from '../domain/ledger';
import {
  canonicalFromEvent,
  retiredInto,
  withFolded,
  withRename,
  withTenantLink,
} from '../registry/canonical-ops';

/** Fields compared between a replayed and a live canonical unit. */
const COMPARED_FIELDS = [
  'level',
  'parentId',
  'primaryName',
  'normalizedName',
  'alternateNames',
  'tenantIds',
  'tenantReferenceCount',
  'governmentCode',
  'verification',
  'retired',
  'mergedInto',
] as const;

export type ComparedField = (typeof COMPARED_FIELDS)[number];

/** A difference between replayed history and the live registry. */
export type LedgerDrift =
  | { canonicalId: string; kind: 'missing-in-registry' }
  | { canonicalId: string; kind: 'missing-in-ledger' }
  | { canonicalId: string; kind: 'field-mismatch'; fields: ComparedField[] };

/** Apply entries, in sequence order, on top of `base`. */
export function replayEntries(entries: SyncLedgerEntry[], base: CanonicalUnit[] = []): CanonicalUnit[] {
  const units = new Map<string, CanonicalUnit>(base.map((u) => [u.id, { ...u }]));
  const ordered = [...entries].sort((a, b) => a.sequence - b.sequence);
  for (const entry of ordered) {
    applyEntry(units, entry);
  }
  return [...units.values()].sort((a, b) =>
    a.createdAt === b.createdAt ? a.id.localeCompare(b.id) : a.createdAt.localeCompare(b.createdAt),
  );
}

function applyEntry(units: Map<string, CanonicalUnit>, entry: SyncLedgerEntry): void {
  const event = entry.event;
  const touch = (unit: CanonicalUnit): void => {
    units.set(unit.id, { ...unit, updatedAt: entry.timestamp });
  };

  switch (event.kind) {
    case 'unit-created':
      units.set(event.canonicalId, canonicalFromEvent(event, entry.timestamp));
      return;
    case 'unit-matched': {
      const unit = units.get(event.canonicalId);
      // Created before the replay window and absent from the base.
      if (!unit) return;
      touch(withTenantLink(unit, event.tenantId, event.names));
      return;
    }
    case 'unit-merged': {
      const primary = units.get(event.primaryId);
      const secondary = units.get(event.secondaryId);
      if (!primary || !secondary) return;
      for (const child of units.values()) {
        if (!child.retired && child.parentId === secondary.id) {
          touch({ ...child, parentId: primary.id });
        }
      }
      touch(withFolded(primary, secondary));
      touch(retiredInto(secondary, primary.id));
      return;
    }
    case 'unit-renamed': {
      const unit = units.get(event.canonicalId);
      if (!unit) return;
      touch(withRename(unit, event.primaryName, event.normalizedName));
      return;
    }
    case 'unit-verification-changed': {
      const unit = units.get(event.canonicalId);
      if (!unit) return;
      touch({ ...unit, verification: event.to });
      return;
    }
    case 'conflict-opened':
    case 'conflict-resolved':
      return;
  }
}

function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => v === b[i]);
  }
  return a === b;
}

/** Compare replayed units against the live registry. */
export function diffUnits(replayed: CanonicalUnit[], live: CanonicalUnit[]): LedgerDrift[] {
  const drift: LedgerDrift[] = [];
  const liveById = new Map(live.map((u) => [u.id, u]));
  const replayedIds = new Set<string>();

  for (const unit of replayed) {
    replayedIds.add(unit.id);
    const current = liveById.get(unit.id);
    if (!current) {
      drift.push({ canonicalId: unit.id, kind: 'missing-in-registry' });
      continue;
    }
    const fields = COMPARED_FIELDS.filter((f) => !sameValue(unit[f], current[f]));
    if (fields.length > 0) {
      drift.push({ canonicalId: unit.id, kind: 'field-mismatch', fields });
    }
  }
  for (const unit of live) {
    if (!replayedIds.has(unit.id)) {
      drift.push({ canonicalId: unit.id, kind: 'missing-in-ledger' });
    }
  }
  return drift;
}
