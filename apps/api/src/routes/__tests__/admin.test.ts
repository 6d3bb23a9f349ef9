import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UserResponseSchema, UserSummarySchema } from '@accounts/types';
import { z } from 'zod';
import {
  ErrorBodySchema,
  type TestContext,
  createAdmin,
  createTestContext,
  loginUser,
  makeAuthenticatedRequest,
  makeRequest,
  readJson,
  registerUser,
} from '../../test/helpers.js';

const UserListBodySchema = z.object({
  users: z.array(UserSummarySchema),
  total: z.number(),
  limit: z.number(),
  offset: z.number(),
});

describe('Admin routes', () => {
  let context: TestContext;

  beforeEach(async () => {
    context = await createTestContext();
  });

  afterEach(async () => {
    await context.close();
  });

  it('answers 401 without a token and 403 for a regular user', async () => {
    await registerUser(context);
    const session = await loginUser(context);

    const anonymous = await makeRequest(context.app, 'GET', '/admin/users');
    const regular = await makeAuthenticatedRequest(context.app, 'GET', '/admin/users', session.access);

    expect(anonymous.status).toBe(401);
    expect(regular.status).toBe(403);
  });

  it('lists users with paging', async () => {
    const { session } = await createAdmin(context);
    await registerUser(context);

    const response = await makeAuthenticatedRequest(context.app, 'GET', '/admin/users?limit=1', session.access);

    expect(response.status).toBe(200);
    const body = await readJson(response, UserListBodySchema);
    expect(body.total).toBe(2);
    expect(body.limit).toBe(1);
    expect(body.offset).toBe(0);
    expect(body.users).toHaveLength(1);
  });

  it('rejects an out-of-range page size', async () => {
    const { session } = await createAdmin(context);

    const response = await makeAuthenticatedRequest(context.app, 'GET', '/admin/users?limit=0', session.access);

    expect(response.status).toBe(400);
    expect((await readJson(response, ErrorBodySchema)).issues?.[0]?.field).toBe('limit');
  });

  it('returns a single user and 404 for an unknown id', async () => {
    const { session } = await createAdmin(context);
    const user = await registerUser(context);

    const found = await makeAuthenticatedRequest(context.app, 'GET', `/admin/users/${user.id}`, session.access);
    const missing = await makeAuthenticatedRequest(
      context.app,
      'GET',
      '/admin/users/00000000-0000-4000-8000-000000000000',
      session.access
    );

    expect((await readJson(found, UserResponseSchema)).email).toBe('alice@example.com');
    expect(missing.status).toBe(404);
  });

  it('blocks a user and ends their sessions', async () => {
    const { session } = await createAdmin(context);
    const user = await registerUser(context);
    const userSession = await loginUser(context);

    const response = await makeAuthenticatedRequest(context.app, 'PUT', `/admin/users/${user.id}/update`, session.access, {
      body: { is_blocked: true },
    });

    expect(response.status).toBe(200);
    expect((await readJson(response, UserResponseSchema)).is_blocked).toBe(true);

    const refresh = await makeRequest(context.app, 'POST', '/auth/token/refresh', {
      body: { refresh: userSession.refresh },
    });
    expect(refresh.status).toBe(401);
  });

  it('refuses to let an admin restrict their own account', async () => {
    const { user, session } = await createAdmin(context);

    const response = await makeAuthenticatedRequest(context.app, 'PUT', `/admin/users/${user.id}/update`, session.access, {
      body: { role: 'user' },
    });

    expect(response.status).toBe(400);
    expect(await readJson(response, ErrorBodySchema)).toEqual({
      error: 'validation_error',
      message: 'Administrators cannot restrict their own account',
      issues: [{ field: 'role', message: 'You cannot change your own role' }],
    });
  });

  it('rejects an empty update', async () => {
    const { session } = await createAdmin(context);
    const user = await registerUser(context);

    const response = await makeAuthenticatedRequest(context.app, 'PUT', `/admin/users/${user.id}/update`, session.access, {
      body: {},
    });

    expect(response.status).toBe(400);
  });

  it('deletes a user', async () => {
    const { session } = await createAdmin(context);
    const user = await registerUser(context);

    const deleted = await makeAuthenticatedRequest(context.app, 'DELETE', `/admin/users/${user.id}`, session.access);
    const lookup = await makeAuthenticatedRequest(context.app, 'GET', `/admin/users/${user.id}`, session.access);
    const again = await makeAuthenticatedRequest(context.app, 'DELETE', `/admin/users/${user.id}`, session.access);

    expect(deleted.status).toBe(204);
    expect(lookup.status).toBe(404);
    expect(again.status).toBe(404);
  });
});
