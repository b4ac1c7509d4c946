export * from './schema.js';
export { createDatabase } from './client.js';
export type { AuthDatabase, DatabaseHandle } from './client.js';
