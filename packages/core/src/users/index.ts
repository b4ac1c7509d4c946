export { UserRepository } from './user-repository.js';
export type { SessionLookup } from './user-repository.js';
export { UserService, toUser } from './user-service.js';
export * from './user-errors.js';
export * from './user-types.js';
