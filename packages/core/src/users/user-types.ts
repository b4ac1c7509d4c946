/**
 * User Domain Types
 */

/** Public attributes of a user; the password hash never leaves the store. */
export interface User {
  username: string;
  fullName: string;
  email: string;
  isAdmin: boolean;
  confirmed: boolean;
  created: Date;
}

export type LoginResult = 'success' | 'failure' | '';

export interface LastLogin {
  time: Date | null;
  result: LoginResult;
}

export interface SessionUser extends User {
  lastLogin: LastLogin;
}

export interface RegisterUserParams {
  username: string;
  fullName: string;
  email: string;
  password: string;
}
