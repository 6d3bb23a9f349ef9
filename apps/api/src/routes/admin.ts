/**
 * User administration. Every route requires the admin capability. Mounted at /admin.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { AdminUserUpdateSchema, UserListQuerySchema } from '@accounts/types';
import { getPrincipal, requireAuth } from '../middleware/auth.js';
import { rejectInvalid, requestContext } from '../lib/validation.js';
import type { ApiServices } from '../services/index.js';
import type { AppBindings } from '../types/context.js';

export function createAdminRoutes(services: Pick<ApiServices, 'accounts'>) {
  const { accounts } = services;
  const adminRoutes = new Hono<AppBindings>();

  adminRoutes.use('*', requireAuth(accounts, ['admin']));

  adminRoutes.get('/users', zValidator('query', UserListQuerySchema, rejectInvalid), async (c) => {
    return c.json(await accounts.listUsers(getPrincipal(c), c.req.valid('query')));
  });

  adminRoutes.get('/users/:id', async (c) => {
    return c.json(await accounts.getUser(getPrincipal(c), c.req.param('id')));
  });

  adminRoutes.put('/users/:id/update', zValidator('json', AdminUserUpdateSchema, rejectInvalid), async (c) => {
    const user = await accounts.adminUpdate(
      getPrincipal(c),
      c.req.param('id'),
      c.req.valid('json'),
      requestContext(c)
    );
    return c.json(user);
  });

  adminRoutes.delete('/users/:id', async (c) => {
    await accounts.adminDelete(getPrincipal(c), c.req.param('id'), requestContext(c));
    return c.body(null, 204);
  });

  return adminRoutes;
}
