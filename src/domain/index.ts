/**
 * Domain model exports.
 */

export * from './canonical-unit';
export * from './conflict';
export * from './errors';
export * from './ledger';
export * from './tenant-unit';
