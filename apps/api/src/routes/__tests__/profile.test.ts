import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UserResponseSchema } from '@accounts/types';
import {
  ErrorBodySchema,
  type TestContext,
  createTestContext,
  loginUser,
  makeAuthenticatedRequest,
  makeRequest,
  readJson,
  registerUser,
} from '../../test/helpers.js';

describe('Profile routes', () => {
  let context: TestContext;

  beforeEach(async () => {
    context = await createTestContext();
  });

  afterEach(async () => {
    await context.close();
  });

  it('requires authentication', async () => {
    const response = await makeRequest(context.app, 'GET', '/profile');

    expect(response.status).toBe(401);
  });

  it('rejects a malformed authorization header', async () => {
    const response = await makeRequest(context.app, 'GET', '/profile', {
      headers: { Authorization: 'Token abc' },
    });

    expect(response.status).toBe(401);
    expect(await readJson(response, ErrorBodySchema)).toEqual({
      error: 'unauthorized',
      message: 'Invalid authorization header',
    });
  });

  it('returns the caller profile', async () => {
    const registered = await registerUser(context);
    const session = await loginUser(context);

    const response = await makeAuthenticatedRequest(context.app, 'GET', '/profile', session.access);

    expect(response.status).toBe(200);
    const profile = await readJson(response, UserResponseSchema);
    expect(profile.id).toBe(registered.id);
    expect(profile.username).toBe('alice');
  });

  it('updates editable fields and clears one with null', async () => {
    await registerUser(context);
    const session = await loginUser(context);
    await makeAuthenticatedRequest(context.app, 'PUT', '/profile/update', session.access, {
      body: { country: 'Portugal', phone_number: '+351 555 0100' },
    });

    const response = await makeAuthenticatedRequest(context.app, 'PUT', '/profile/update', session.access, {
      body: { bio: 'Writes code', phone_number: null },
    });

    expect(response.status).toBe(200);
    const profile = await readJson(response, UserResponseSchema);
    expect(profile.bio).toBe('Writes code');
    expect(profile.country).toBe('Portugal');
    expect(profile.phone_number).toBeNull();
  });

  it('rejects fields outside the editable profile', async () => {
    await registerUser(context);
    const session = await loginUser(context);

    const response = await makeAuthenticatedRequest(context.app, 'PUT', '/profile/update', session.access, {
      body: { role: 'admin' },
    });

    expect(response.status).toBe(400);
    expect((await readJson(response, ErrorBodySchema)).error).toBe('validation_error');
  });

  it('rejects a username that is already taken', async () => {
    await registerUser(context);
    await registerUser(context, { email: 'bob@example.com', username: 'bob' });
    const session = await loginUser(context);

    const response = await makeAuthenticatedRequest(context.app, 'PUT', '/profile/update', session.access, {
      body: { username: 'bob' },
    });

    expect(response.status).toBe(400);
    expect(await readJson(response, ErrorBodySchema)).toEqual({
      error: 'duplicate_resource',
      message: 'A user with that username already exists',
    });
  });

  it('forbids a blocked account holding a still-valid access token', async () => {
    const user = await registerUser(context);
    const session = await loginUser(context);
    await context.services.users.updateStatus(user.id, { isBlocked: true });

    const response = await makeAuthenticatedRequest(context.app, 'GET', '/profile', session.access);

    expect(response.status).toBe(403);
    expect(await readJson(response, ErrorBodySchema)).toEqual({
      error: 'forbidden',
      message: 'You do not have permission to perform this action',
    });
  });
});
