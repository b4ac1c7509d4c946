import type { Context } from 'hono';
import { html } from 'hono/html';
import type { SessionUser } from '@gatehouse/core';

export type Html = ReturnType<typeof html>;

interface LayoutProps {
  appName: string;
  title: string;
  user: SessionUser | null;
  content: Html;
}

const STYLES = `
body { font-family: system-ui, sans-serif; max-width: 48rem; margin: 2rem auto; padding: 0 1rem; }
header { display: flex; justify-content: space-between; border-bottom: 1px solid #ccc; }
nav a { margin-left: 1rem; }
label { display: block; margin-top: 0.75rem; }
.alert { color: #a00; }
table { border-collapse: collapse; }
td, th { border: 1px solid #ccc; padding: 0.25rem 0.5rem; }
`;

function navigation(user: SessionUser | null): Html {
  if (!user) {
    return html`<nav><a href="/login">Login</a><a href="/register">Register</a></nav>`;
  }
  return html`<nav>
    <a href="/user">${user.username}</a>
    ${user.isAdmin ? html`<a href="/users">Users</a><a href="/events">Events</a>` : ''}
    <a href="/logout">Logout</a>
  </nav>`;
}

export function layout({ appName, title, user, content }: LayoutProps): Html {
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title} - ${appName}</title>
    <style>${STYLES}</style>
  </head>
  <body>
    <header><a href="/">${appName}</a>${navigation(user)}</header>
    <main>
      <h1>${title}</h1>
      ${content}
    </main>
  </body>
</html>`;
}

export function alert(message: string | undefined): Html | '' {
  return message ? html`<p class="alert" role="alert">${message}</p>` : '';
}

/**
 * Render a page inside the layout with the current user's navigation
 */
export function renderPage(c: Context, title: string, content: Html) {
  const { config } = c.get('services');
  return c.html(layout({ appName: config.appName, title, user: c.get('user') ?? null, content }));
}

export function formatTime(time: Date | null): string {
  return time ? time.toISOString() : '';
}
