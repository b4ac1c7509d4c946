import { z } from 'zod';

// Closed set of token kinds persisted in the tokens table
export const TokenKindSchema = z.enum(['session', 'reset', 'confirm']);

export type TokenKind = z.infer<typeof TokenKindSchema>;

export const TOKEN_KINDS = TokenKindSchema.options;
