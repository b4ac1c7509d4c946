import { Hono } from 'hono';
import { requireAdmin } from '../middleware/require-admin.js';
import { renderPage } from '../views/layout.js';
import { eventsPage, userPage, usersPage } from '../views/pages.js';
import type { AppBindings } from '../types/context.js';

/**
 * Read-only views over the identity store and event journal
 */
const userRoute = new Hono<AppBindings>();

userRoute.get('/', (c) => renderPage(c, 'User', userPage(c.get('user'))));

const usersRoute = new Hono<AppBindings>();

usersRoute.use('*', requireAdmin);
usersRoute.get('/', async (c) => {
  const users = await c.get('services').users.listUsers();
  return renderPage(c, 'Users', usersPage(users));
});

const eventsRoute = new Hono<AppBindings>();

eventsRoute.use('*', requireAdmin);
eventsRoute.get('/', async (c) => {
  const events = await c.get('services').journal.list();
  return renderPage(c, 'Events', eventsPage(events));
});

export { userRoute, usersRoute, eventsRoute };
