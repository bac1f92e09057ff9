/**
 * Hierarchy continuity checks for tenant units.
 */

import { InvalidHierarchyError } from '../domain/errors';
import { TenantGeoUnit } from '../domain/tenant-unit';
import { TenantUnitStore } from '../storage/store';

export interface HierarchyClaim {
  tenantId: string;
  level: number;
  parentId: string | null;
}

/**
 * Validate a claimed position and return the parent (null at level 0).
 * Levels are integers in `0..maxLevel`; a parent must belong to the same
 * tenant, be active, and sit exactly one level higher. `selfId` rejects a
 * unit being made its own parent when it is re-parented.
 */
export async function validateHierarchy(
  tenantUnits: TenantUnitStore,
  claim: HierarchyClaim,
  maxLevel: number,
  selfId?: string,
): Promise<TenantGeoUnit | null> {
  const { tenantId, level, parentId } = claim;

  if (!Number.isInteger(level) || level < 0 || level > maxLevel) {
    throw new InvalidHierarchyError(`Level must be an integer between 0 and ${maxLevel}`, { level, maxLevel });
  }
  if (level === 0) {
    if (parentId !== null) {
      throw new InvalidHierarchyError('A level 0 unit cannot have a parent', { level, parentId });
    }
    return null;
  }
  if (parentId === null) {
    throw new InvalidHierarchyError(`A level ${level} unit requires a parent at level ${level - 1}`, { level });
  }
  if (parentId === selfId) {
    throw new InvalidHierarchyError('A unit cannot be its own parent', { parentId });
  }

  const parent = await tenantUnits.getById(parentId);
  if (!parent || parent.tenantId !== tenantId) {
    throw new InvalidHierarchyError(`Parent unit not found for tenant: ${parentId}`, { parentId, tenantId });
  }
  if (parent.retired) {
    throw new InvalidHierarchyError(`Parent unit is retired: ${parentId}`, { parentId });
  }
  if (parent.level !== level - 1) {
    throw new InvalidHierarchyError(
      `Parent is at level ${parent.level}; a level ${level} unit needs a parent at level ${level - 1}`,
      { level, parentId, parentLevel: parent.level },
    );
  }
  return parent;
}
