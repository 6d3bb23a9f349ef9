import { Hono } from 'hono';
import { clientIpMiddleware } from './middleware/client-ip.js';
import { createCorsMiddleware } from './middleware/cors.js';
import { createErrorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createAdminRoutes } from './routes/admin.js';
import { createAuthRoutes } from './routes/auth.js';
import { healthRoute } from './routes/health.js';
import { createProfileRoutes } from './routes/profile.js';
import type { ApiServices } from './services/index.js';
import type { AppBindings } from './types/context.js';

export function createApp(services: ApiServices) {
  const { config, logger, keyStore } = services;
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', clientIpMiddleware(config.trustedProxyIps, logger));
  app.use('*', createCorsMiddleware(config.appUrl, logger));

  app.onError(createErrorHandler(logger));
  app.notFound(notFoundHandler);

  app.route('/health', healthRoute);
  app.get('/.well-known/jwks.json', (c) => {
    c.header('Cache-Control', 'public, max-age=300');
    return c.json(keyStore.getJwks());
  });

  app.route('/auth', createAuthRoutes(services));
  app.route('/profile', createProfileRoutes(services));
  app.route('/admin', createAdminRoutes(services));

  return app;
}

export type App = ReturnType<typeof createApp>;
