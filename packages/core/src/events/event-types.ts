import type { EventName } from '@gatehouse/types';

export interface AuthEvent {
  id: number;
  name: EventName;
  success: boolean;
  username: string;
  message: string;
  created: Date;
}

export interface LoginRecord {
  created: Date;
  success: boolean;
}

/** Messages written alongside events; none of them may carry credentials. */
export const EventMessages = {
  loggedIn: 'logged in user',
  loginFailed: 'login failed',
  loggedOut: 'logged out user',
  registered: 'registered user',
  usernameExists: 'user name already exists',
  emailExists: 'email already exists',
  resetToken: 'saved reset token',
  confirmToken: 'saved confirm token',
  success: 'success',
} as const;
