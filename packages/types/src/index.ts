export * from './auth.schema.js';
export * from './event.schema.js';
export * from './token.schema.js';
