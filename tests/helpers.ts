/**
 * Shared test fixtures.
 */

import { AppContext, createAppContext } from '../src/server';
import { ConfigOverrides, createConfig } from '../src/config';
import { LogEntry, setLogHandler } from '../src/logger';
import { IngestAck } from '../src/domain/tenant-unit';

/** Route log output into an array instead of the console. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => {
    entries.push(entry);
  });
  return entries;
}

export function testContext(overrides: ConfigOverrides = {}): AppContext {
  return createAppContext({ config: createConfig(overrides) });
}

/** Submit a unit and return its acknowledgement. */
export async function submitUnit(
  ctx: AppContext,
  tenantId: string,
  level: number,
  parentId: string | null,
  name: string,
): Promise<IngestAck> {
  return ctx.ingest.submit({ tenantId, level, parentId, names: { en: name } });
}

/** Acknowledged canonical id; fails the test when the unit is not linked. */
export function linkedCanonical(ack: IngestAck): string {
  if (!ack.canonicalId) throw new Error(`Unit ${ack.unitId} is not linked (${ack.syncState})`);
  return ack.canonicalId;
}

/** Acknowledged conflict case id; fails the test when there is none. */
export function openCase(ack: IngestAck): string {
  if (!ack.conflictCaseId) throw new Error(`Unit ${ack.unitId} has no open case (${ack.syncState})`);
  return ack.conflictCaseId;
}

/**
 * Two tenants that each entered Nepal > Bagmati Province; both are linked
 * to the same canonical units.
 */
export async function seedTwoTenants(ctx: AppContext) {
  const t1Nepal = await submitUnit(ctx, 'tenant-a', 0, null, 'Nepal');
  const t1Bagmati = await submitUnit(ctx, 'tenant-a', 1, t1Nepal.unitId, 'Bagmati Province');
  const t2Nepal = await submitUnit(ctx, 'tenant-b', 0, null, 'Nepal');
  const t2Bagmati = await submitUnit(ctx, 'tenant-b', 1, t2Nepal.unitId, 'Bagmati');
  return {
    nepalId: linkedCanonical(t1Nepal),
    bagmatiId: linkedCanonical(t1Bagmati),
    a: { nepal: t1Nepal.unitId, bagmati: t1Bagmati.unitId },
    b: { nepal: t2Nepal.unitId, bagmati: t2Bagmati.unitId },
  };
}
