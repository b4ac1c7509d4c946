export { TokenRepository } from './token-repository.js';
export { TokenService } from './token-service.js';
export * from './token-errors.js';
export * from './token-types.js';
