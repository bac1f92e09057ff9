/**
 * Pure state changes of canonical units.
 *
 * The registry applies these when it writes and the ledger applies them
 * when it replays, so a replayed registry is identical to the live one.
 */

import { CanonicalUnit } from '../domain/canonical-unit';
import { UnitCreatedEvent } from '../domain/ledger';

function union(existing: string[], added: string[]): string[] {
  const result = [...existing];
  for (const value of added) {
    if (!result.includes(value)) result.push(value);
  }
  return result;
}

/** Canonical unit described by a `unit-created` event. */
export function canonicalFromEvent(event: UnitCreatedEvent, timestamp: string): CanonicalUnit {
  return {
    id: event.canonicalId,
    level: event.level,
    parentId: event.parentId,
    primaryName: event.primaryName,
    normalizedName: event.normalizedName,
    alternateNames: union([event.primaryName], event.names),
    tenantIds: [event.tenantId],
    tenantReferenceCount: 1,
    governmentCode: event.governmentCode,
    verification: 'unverified',
    retired: false,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Record one more tenant and its spellings. Tenants are counted once. */
export function withTenantLink(unit: CanonicalUnit, tenantId: string, names: string[]): CanonicalUnit {
  const tenantIds = union(unit.tenantIds, [tenantId]);
  return {
    ...unit,
    alternateNames: union(unit.alternateNames, names),
    tenantIds,
    tenantReferenceCount: tenantIds.length,
  };
}

/** Fold the secondary's names and tenants into the primary. */
export function withFolded(primary: CanonicalUnit, secondary: CanonicalUnit): CanonicalUnit {
  const tenantIds = union(primary.tenantIds, secondary.tenantIds);
  return {
    ...primary,
    alternateNames: union(primary.alternateNames, secondary.alternateNames),
    tenantIds,
    tenantReferenceCount: tenantIds.length,
    governmentCode: primary.governmentCode ?? secondary.governmentCode,
  };
}

/** The secondary of a merge: retired and pointing at its survivor. */
export function retiredInto(secondary: CanonicalUnit, primaryId: string): CanonicalUnit {
  return { ...secondary, retired: true, mergedInto: primaryId };
}

/** New primary name; the previous one remains an alternate. */
export function withRename(unit: CanonicalUnit, primaryName: string, normalizedName: string): CanonicalUnit {
  return {
    ...unit,
    primaryName,
    normalizedName,
    alternateNames: union(unit.alternateNames, [primaryName]),
  };
}
