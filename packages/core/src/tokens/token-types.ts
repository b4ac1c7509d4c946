/**
 * Token Domain Types
 */

export interface IssuedToken {
  /** Plaintext value; returned once, never stored. Empty for a no-op issue. */
  value: string;
  expires: Date;
}

export interface TokenOwner {
  username: string;
  expires: Date;
}

export interface TokenServiceOptions {
  /** Session lifetime; other kinds use their fixed defaults */
  sessionTtlSeconds?: number;
}
