/**
 * Canonical unit domain model.
 *
 * The single cross-tenant record for one real-world place. Canonical units
 * outlive the tenants that reference them and are retired, never deleted,
 * when folded into another unit.
 */

export type VerificationState = 'unverified' | 'verified' | 'disputed';

export interface CanonicalUnit {
  id: string;
  level: number;
  /** Canonical parent; null at level 0. */
  parentId: string | null;
  primaryName: string;
  normalizedName: string;
  /** Every distinct spelling observed from tenants, the primary name included. */
  alternateNames: string[];
  /** Distinct tenants that have linked a unit here. */
  tenantIds: string[];
  tenantReferenceCount: number;
  governmentCode?: string;
  verification: VerificationState;
  retired: boolean;
  /** Surviving unit when this one was folded by a merge. */
  mergedInto?: string;
  createdAt: string;
  updatedAt: string;
}

/** Uniqueness key of a non-retired canonical unit. */
export function canonicalKey(level: number, parentId: string | null, normalizedName: string): string {
  return `${level}:${parentId ?? 'root'}:${normalizedName}`;
}

/**
 * Derived confidence in a canonical unit. Not stored: it follows from the
 * verification state and how many tenants independently reported the place.
 */
export function canonicalConfidence(unit: CanonicalUnit): number {
  if (unit.retired) return 0;
  if (unit.verification === 'verified') return 1;
  const base = 1 - Math.pow(0.5, unit.tenantReferenceCount);
  return unit.verification === 'disputed' ? base / 2 : base;
}
