import { html } from 'hono/html';
import type { AuthEvent, SessionUser, User } from '@gatehouse/core';
import { formatTime, type Html } from './layout.js';

export function homePage(user: SessionUser | null): Html {
  if (!user) {
    return html`<p>You are not logged in. <a href="/login">Login</a> or <a href="/register">register</a>.</p>`;
  }
  return html`<p>Welcome, ${user.fullName}.</p>
${user.confirmed ? '' : html`<p>Your email is not confirmed. <a href="/confirm_request">Confirm it</a>.</p>`}`;
}

export function logoutPage(): Html {
  return html`<p>You have been logged out. <a href="/login">Login again</a>.</p>`;
}

// Same wording whether or not the address is registered
export function sentPage(email: string): Html {
  return html`<p>An email has been sent to ${email}. Follow its instructions to continue.</p>`;
}

export function userPage(user: SessionUser | null): Html {
  if (!user) {
    return html`<p>You are not logged in.</p>`;
  }
  return html`<dl>
  <dt>User Name</dt><dd>${user.username}</dd>
  <dt>Full Name</dt><dd>${user.fullName}</dd>
  <dt>Email</dt><dd>${user.email}</dd>
  <dt>Confirmed</dt><dd>${user.confirmed ? 'yes' : 'no'}</dd>
  <dt>Administrator</dt><dd>${user.isAdmin ? 'yes' : 'no'}</dd>
  <dt>Created</dt><dd>${formatTime(user.created)}</dd>
  <dt>Last Login</dt><dd>${formatTime(user.lastLogin.time)}</dd>
  <dt>Last Login Result</dt><dd>${user.lastLogin.result}</dd>
</dl>`;
}

export function usersPage(users: User[]): Html {
  return html`<table>
  <thead><tr><th>User Name</th><th>Full Name</th><th>Email</th><th>Admin</th><th>Confirmed</th><th>Created</th></tr></thead>
  <tbody>
    ${users.map(
      (user) => html`<tr>
      <td>${user.username}</td><td>${user.fullName}</td><td>${user.email}</td>
      <td>${String(user.isAdmin)}</td><td>${String(user.confirmed)}</td><td>${formatTime(user.created)}</td>
    </tr>`
    )}
  </tbody>
</table>`;
}

export function eventsPage(events: AuthEvent[]): Html {
  return html`<table>
  <thead><tr><th>Name</th><th>Success</th><th>User Name</th><th>Message</th><th>Created</th></tr></thead>
  <tbody>
    ${events.map(
      (event) => html`<tr>
      <td>${event.name}</td><td>${String(event.success)}</td><td>${event.username}</td>
      <td>${event.message}</td><td>${formatTime(event.created)}</td>
    </tr>`
    )}
  </tbody>
</table>`;
}
