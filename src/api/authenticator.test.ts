import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { NotificationLevel } from '../notifications/notifier.js';
import { createTestContext, requestJson, routedFetch } from '../test/context.js';
import { Authenticator } from './authenticator.js';

const API_URL = 'https://b.submeta.io/api';
const credentials = { username: 'student', password: 'test-secret' };

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('Authenticator', () => {
  it('should post the Login mutation and return the token', async () => {
    const fetchMock = routedFetch((url) =>
      url === API_URL
        ? json({ data: { login: { token: 'test-token', user: { id: 'u1' }, errors: null } } })
        : undefined,
    );
    const ctx = createTestContext(fetchMock);

    const result = await new Authenticator(ctx).login(credentials);

    expect(result).toEqual({ ok: true, value: 'test-token' });

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Origin: 'https://submeta.io',
      Referer: 'https://submeta.io/',
    });
    expect(requestJson(init)).toMatchObject({
      operationName: 'Login',
      variables: { input: { username: 'student', password: 'test-secret' } },
    });
    expect(ctx.notifier.notify).toHaveBeenCalledWith(NotificationLevel.SUCCESS, 'Login successful! Token obtained');
    expect(readFileSync(ctx.logFile, 'utf-8')).toContain('INFO - Login successful!');
  });

  it('should fail without throwing when the token is missing', async () => {
    const body = { data: { login: { token: null, user: null, errors: [{ key: 'password', message: 'Wrong password' }] } } };
    const ctx = createTestContext(routedFetch(() => json(body)));

    const result = await new Authenticator(ctx).login(credentials);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.name).toBe('AuthError');
    expect(result.error.message).toBe('Login failed: password: Wrong password');
    expect(readFileSync(ctx.logFile, 'utf-8')).toContain(`ERROR - Login failed. Response: ${JSON.stringify(body)}`);
  });

  it('should accept a token even when other fields are malformed', async () => {
    const body = { data: { login: { token: 'test-token', user: 'unexpected', errors: [{ key: 'x', message: null }] } } };
    const ctx = createTestContext(routedFetch(() => json(body)));

    const result = await new Authenticator(ctx).login(credentials);

    expect(result).toEqual({ ok: true, value: 'test-token' });
  });

  it('should skip malformed error entries when explaining a failure', async () => {
    const body = { data: { login: { token: null, errors: [{ key: 'x', message: null }, { message: 'Account locked' }] } } };
    const ctx = createTestContext(routedFetch(() => json(body)));

    const result = await new Authenticator(ctx).login(credentials);

    expect(!result.ok && result.error.message).toBe('Login failed: Account locked');
  });

  it('should fail on top-level GraphQL errors', async () => {
    const ctx = createTestContext(routedFetch(() => json({ errors: [{ message: 'Syntax error' }], data: null })));

    const result = await new Authenticator(ctx).login(credentials);

    expect(!result.ok && result.error.message).toBe('Login failed: Syntax error');
  });

  it('should fail with a generic reason when nothing explains the missing token', async () => {
    const ctx = createTestContext(routedFetch(() => json({ data: { login: {} } })));

    const result = await new Authenticator(ctx).login(credentials);

    expect(!result.ok && result.error.message).toBe('Login failed: no token in response');
  });

  it('should report HTTP errors as network failures', async () => {
    const ctx = createTestContext(routedFetch(() => json({}, 401)));

    const result = await new Authenticator(ctx).login(credentials);

    expect(!result.ok && result.error.name).toBe('HttpStatusError');
    expect(readFileSync(ctx.logFile, 'utf-8')).toContain('ERROR - Network error during login: HTTP 401');
  });

  it('should report a non-JSON body', async () => {
    const ctx = createTestContext(routedFetch(() => new Response('<html>maintenance</html>')));

    const result = await new Authenticator(ctx).login(credentials);

    expect(!result.ok && result.error.name).toBe('ParseError');
  });
});
