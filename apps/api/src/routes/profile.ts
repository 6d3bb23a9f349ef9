/**
 * Own-profile endpoints for active, unblocked accounts. Mounted at /profile.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ProfileUpdateSchema } from '@accounts/types';
import { getPrincipal, requireAuth } from '../middleware/auth.js';
import { rejectInvalid, requestContext } from '../lib/validation.js';
import type { ApiServices } from '../services/index.js';
import type { AppBindings } from '../types/context.js';

export function createProfileRoutes(services: Pick<ApiServices, 'accounts'>) {
  const { accounts } = services;
  const profileRoutes = new Hono<AppBindings>();

  profileRoutes.use('*', requireAuth(accounts, ['active', 'not_blocked']));

  profileRoutes.get('/', async (c) => {
    return c.json(await accounts.getProfile(getPrincipal(c)));
  });

  profileRoutes.put('/update', zValidator('json', ProfileUpdateSchema, rejectInvalid), async (c) => {
    const user = await accounts.updateProfile(getPrincipal(c), c.req.valid('json'), requestContext(c));
    return c.json(user);
  });

  return profileRoutes;
}
