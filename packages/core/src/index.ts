/**
 * @gatehouse/core - identity, token and audit stores
 *
 * Repositories hold the drizzle queries; services hold the rules the
 * API layer relies on.
 */

export * from './users/index.js';
export * from './tokens/index.js';
export * from './events/index.js';
export { createStores } from './stores.js';
export type { Stores, StoreOptions } from './stores.js';
