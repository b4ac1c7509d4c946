import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { requestContext } from './middleware/request-context.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { securityHeaders } from './middleware/security-headers.js';
import { sessionMiddleware } from './middleware/session.js';
import { confirmRequestRoute } from './routes/confirm-request.js';
import { confirmRoute } from './routes/confirm.js';
import { eventStreamRoute } from './routes/event-stream.js';
import { forgotRoute } from './routes/forgot.js';
import { healthRoute } from './routes/health.js';
import { loginRoute } from './routes/login.js';
import { logoutRoute } from './routes/logout.js';
import { registerRoute } from './routes/register.js';
import { resetRoute } from './routes/reset.js';
import { eventsRoute, userRoute, usersRoute } from './routes/users.js';
import type { Services } from './services/index.js';
import type { AppBindings } from './types/context.js';
import { renderPage } from './views/layout.js';
import { homePage } from './views/pages.js';

export function createApp(services: Services) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', requestContext(services));
  app.use('*', securityHeaders);
  app.use('*', sessionMiddleware);

  app.get('/', (c) => renderPage(c, 'Home', homePage(c.get('user'))));

  app.route('/health', healthRoute);
  app.route('/register', registerRoute);
  app.route('/login', loginRoute);
  app.route('/logout', logoutRoute);
  app.route('/forgot', forgotRoute);
  app.route('/confirm_request', confirmRequestRoute);
  app.route('/reset', resetRoute);
  app.route('/confirm', confirmRoute);
  app.route('/user', userRoute);
  app.route('/users', usersRoute);
  app.route('/events', eventsRoute);
  app.route('/', eventStreamRoute);

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const logger = c.get('logger') ?? services.logger;
    logger.error({ err, method: c.req.method, path: c.req.path }, 'Unhandled error');
    return c.text('Internal Server Error', 500);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
