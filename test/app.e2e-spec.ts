import { NestFastifyApplication } from '@nestjs/platform-fastify';

import {
  bearer,
  completionReply,
  createTestAppHarness,
  registerAndLogin,
  TestAppHarness,
} from './create-test-app';

describe('Users and keys (e2e)', () => {
  let harness: TestAppHarness;
  let app: NestFastifyApplication;

  beforeEach(async () => {
    harness = await createTestAppHarness();
    app = await harness.start();
  });

  afterEach(async () => {
    await harness.closeAll();
  });

  it('walks a user from registration to a completion and logout', async () => {
    const registered = await app.inject({
      method: 'POST',
      url: '/users/register',
      payload: { username: 'bob', password: 'test-password' },
    });
    expect(registered.statusCode).toBe(201);
    const { userId } = registered.json<{ userId: string }>();

    const loggedIn = await app.inject({
      method: 'POST',
      url: '/users/login',
      payload: { username: 'bob', password: 'test-password' },
    });
    expect(loggedIn.statusCode).toBe(200);
    const session = loggedIn.json<{ token: string; userId: string }>();
    expect(session.userId).toBe(userId);

    const added = await app.inject({
      method: 'POST',
      url: '/keys',
      headers: bearer(session.token),
      payload: { value: 'bob-key-1' },
    });
    expect(added.statusCode).toBe(201);
    expect(added.json<{ credentialId: string }>().credentialId).toMatch(/^[0-9a-f-]{36}$/);

    const listed = await app.inject({
      method: 'GET',
      url: '/keys',
      headers: bearer(session.token),
    });
    expect(listed.json()).toEqual({ keys: ['bob-key-1'] });

    harness.upstream.postJson.mockResolvedValueOnce(completionReply('Hi Bob'));
    const chat = await app.inject({
      method: 'POST',
      url: '/chat/completions',
      payload: { model: 'test-model', messages: [{ role: 'user', content: 'Hello' }] },
    });
    expect(chat.statusCode).toBe(200);
    expect(chat.json()).toEqual({
      content: 'Hi Bob',
      usage: { prompt_tokens: 5, completion_tokens: 7, total_tokens: 12 },
    });

    const loggedOut = await app.inject({
      method: 'POST',
      url: '/users/logout',
      headers: bearer(session.token),
    });
    expect(loggedOut.statusCode).toBe(204);

    const afterLogout = await app.inject({
      method: 'GET',
      url: '/keys',
      headers: bearer(session.token),
    });
    expect(afterLogout.statusCode).toBe(401);
    expect(afterLogout.json()).toEqual({
      statusCode: 401,
      message: 'Invalid or expired session token',
      error: 'Unauthorized',
    });
  });

  it('keeps users, sessions and keys across a restart', async () => {
    const { token } = await registerAndLogin(app, 'alice');
    await app.inject({
      method: 'POST',
      url: '/keys',
      headers: bearer(token),
      payload: { value: 'alice-key-1' },
    });
    await app.inject({
      method: 'POST',
      url: '/keys',
      headers: bearer(token),
      payload: { value: 'alice-key-2', endpoint: 'https://other.test/v1' },
    });
    await harness.stop(app);

    const restarted = await harness.start();

    const listed = await restarted.inject({ method: 'GET', url: '/keys', headers: bearer(token) });
    expect(listed.statusCode).toBe(200);
    expect(listed.json()).toEqual({ keys: ['alice-key-1', 'alice-key-2'] });

    const loggedIn = await restarted.inject({
      method: 'POST',
      url: '/users/login',
      payload: { username: 'alice', password: 'test-password' },
    });
    expect(loggedIn.statusCode).toBe(200);

    const duplicate = await restarted.inject({
      method: 'POST',
      url: '/users/register',
      payload: { username: 'alice', password: 'another-password' },
    });
    expect(duplicate.statusCode).toBe(409);
  });

  it('rejects a second registration of the same username', async () => {
    await registerAndLogin(app, 'carol');

    const response = await app.inject({
      method: 'POST',
      url: '/users/register',
      payload: { username: 'carol', password: 'other' },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({
      statusCode: 409,
      message: 'Username is already registered',
      error: 'DuplicateUser',
    });
  });

  it('rejects a wrong password', async () => {
    await registerAndLogin(app, 'dave');

    const response = await app.inject({
      method: 'POST',
      url: '/users/login',
      payload: { username: 'dave', password: 'wrong-password' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toMatchObject({ error: 'InvalidCredentials' });
  });

  it('rejects a key another user already pooled', async () => {
    const alice = await registerAndLogin(app, 'alice');
    const bob = await registerAndLogin(app, 'bob');
    await app.inject({
      method: 'POST',
      url: '/keys',
      headers: bearer(alice.token),
      payload: { value: 'shared-key' },
    });

    const response = await app.inject({
      method: 'POST',
      url: '/keys',
      headers: bearer(bob.token),
      payload: { value: 'shared-key' },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({
      statusCode: 409,
      message: 'Credential is already in the pool',
      error: 'DuplicateKey',
    });
    const bobKeys = await app.inject({ method: 'GET', url: '/keys', headers: bearer(bob.token) });
    expect(bobKeys.json()).toEqual({ keys: [] });
  });

  it('only lets the owner remove a key', async () => {
    const alice = await registerAndLogin(app, 'alice');
    const bob = await registerAndLogin(app, 'bob');
    await app.inject({
      method: 'POST',
      url: '/keys',
      headers: bearer(alice.token),
      payload: { value: 'alice-key' },
    });

    const foreign = await app.inject({
      method: 'DELETE',
      url: '/keys',
      headers: bearer(bob.token),
      payload: { value: 'alice-key' },
    });
    expect(foreign.statusCode).toBe(404);
    expect(foreign.json()).toMatchObject({ error: 'NotFound' });

    const own = await app.inject({
      method: 'DELETE',
      url: '/keys',
      headers: bearer(alice.token),
      payload: { value: 'alice-key' },
    });
    expect(own.statusCode).toBe(204);

    const listed = await app.inject({ method: 'GET', url: '/keys', headers: bearer(alice.token) });
    expect(listed.json()).toEqual({ keys: [] });
  });

  it('imports keys in bulk and reports their status', async () => {
    const { token } = await registerAndLogin(app, 'erin');

    const imported = await app.inject({
      method: 'POST',
      url: '/keys/import',
      headers: bearer(token),
      payload: { values: ['bulk-1', 'bulk-2', 'bulk-1'] },
    });
    expect(imported.statusCode).toBe(200);
    expect(imported.json()).toEqual({ added: 2, duplicates: 1 });

    const status = await app.inject({
      method: 'GET',
      url: '/keys/status',
      headers: bearer(token),
    });
    expect(status.statusCode).toBe(200);
    expect(status.json()).toEqual({
      items: [
        {
          value: 'bulk-1',
          endpoint: 'https://upstream.test/v1',
          status: 'active',
          consecutiveFailures: 0,
        },
        {
          value: 'bulk-2',
          endpoint: 'https://upstream.test/v1',
          status: 'active',
          consecutiveFailures: 0,
        },
      ],
    });
  });

  it('requires a bearer token for key management', async () => {
    const response = await app.inject({ method: 'GET', url: '/keys' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      statusCode: 401,
      message: 'Missing bearer token',
      error: 'Unauthorized',
    });
  });

  it('rejects malformed bodies', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/users/register',
      payload: { username: '', password: 'x' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ statusCode: 400, error: 'InvalidRequest' });
  });
});
