import { describe, it, expect } from 'vitest';
import { buildTestApp, readJson, type TestApp } from '../helpers/build-test-app';
import { seedMember, TEST_PASSWORD, type ErrorBody, type LoginBody } from '../helpers/seed';

type PairBody = Omit<LoginBody, 'user' | 'organization'>;

async function login(testApp: TestApp, email: string): Promise<LoginBody> {
  const res = await testApp.app.inject({
    method: 'POST',
    url: '/auth/login',
    payload: { email, password: TEST_PASSWORD },
  });
  expect(res.statusCode).toBe(200);
  return readJson<LoginBody>(res);
}

function bearer(token: string) {
  return { authorization: `Bearer ${token}` };
}

describe('auth session endpoints', () => {
  it('GET /auth/me returns the server-derived identity', async () => {
    const testApp = await buildTestApp();
    const { app, close } = testApp;

    try {
      await seedMember(testApp, { id: 'u1', organizationId: 'o1', role: 'analyst' });
      const { accessToken } = await login(testApp, 'u1@example.test');

      const res = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(accessToken) });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ userId: 'u1', organizationId: 'o1', role: 'analyst' });
    } finally {
      await close();
    }
  });

  it('GET /auth/me without a token is 401 UNAUTHORIZED', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/auth/me' });

      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorBody>(res).error.code).toBe('UNAUTHORIZED');
    } finally {
      await close();
    }
  });

  it('GET /auth/me refuses a refresh token', async () => {
    const testApp = await buildTestApp();
    const { app, close } = testApp;

    try {
      await seedMember(testApp, { id: 'u1', organizationId: 'o1' });
      const { refreshToken } = await login(testApp, 'u1@example.test');

      const res = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(refreshToken) });

      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorBody>(res).error.code).toBe('TOKEN_INVALID');
    } finally {
      await close();
    }
  });

  it('POST /auth/refresh rotates the pair and refuses reuse', async () => {
    const testApp = await buildTestApp();
    const { app, close } = testApp;

    try {
      await seedMember(testApp, { id: 'u1', organizationId: 'o1' });
      const first = await login(testApp, 'u1@example.test');

      const rotated = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: first.refreshToken },
      });
      expect(rotated.statusCode).toBe(200);
      const pair = readJson<PairBody>(rotated);
      expect(pair.tokenType).toBe('Bearer');
      expect(pair.refreshToken).not.toBe(first.refreshToken);

      const me = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(pair.accessToken) });
      expect(me.statusCode).toBe(200);

      const replay = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: first.refreshToken },
      });
      expect(replay.statusCode).toBe(401);
      expect(readJson<ErrorBody>(replay).error.code).toBe('TOKEN_REVOKED');
    } finally {
      await close();
    }
  });

  it('POST /auth/refresh refuses an access token', async () => {
    const testApp = await buildTestApp();
    const { app, close } = testApp;

    try {
      await seedMember(testApp, { id: 'u1', organizationId: 'o1' });
      const { accessToken } = await login(testApp, 'u1@example.test');

      const res = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: accessToken },
      });

      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorBody>(res).error.code).toBe('TOKEN_INVALID');
    } finally {
      await close();
    }
  });

  it('POST /auth/refresh reports USER_NOT_FOUND for a deleted user', async () => {
    const testApp = await buildTestApp();
    const { app, close } = testApp;

    try {
      await seedMember(testApp, { id: 'u1', organizationId: 'o1' });
      const { refreshToken } = await login(testApp, 'u1@example.test');
      testApp.stores.users.remove('u1');

      const res = await app.inject({ method: 'POST', url: '/auth/refresh', payload: { refreshToken } });

      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorBody>(res).error.code).toBe('USER_NOT_FOUND');
    } finally {
      await close();
    }
  });

  it('POST /auth/logout revokes the access token and the given refresh token only', async () => {
    const testApp = await buildTestApp();
    const { app, close } = testApp;

    try {
      await seedMember(testApp, { id: 'u1', organizationId: 'o1' });
      const phone = await login(testApp, 'u1@example.test');
      const laptop = await login(testApp, 'u1@example.test');

      const out = await app.inject({
        method: 'POST',
        url: '/auth/logout',
        headers: bearer(phone.accessToken),
        payload: { refreshToken: phone.refreshToken },
      });
      expect(out.statusCode).toBe(200);
      expect(out.json()).toEqual({ message: 'Logged out' });

      const meAfter = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(phone.accessToken) });
      expect(meAfter.statusCode).toBe(401);
      expect(readJson<ErrorBody>(meAfter).error.code).toBe('TOKEN_REVOKED');

      const refreshAfter = await app.inject({
        method: 'POST',
        url: '/auth/refresh',
        payload: { refreshToken: phone.refreshToken },
      });
      expect(readJson<ErrorBody>(refreshAfter).error.code).toBe('TOKEN_REVOKED');

      const otherSession = await app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: bearer(laptop.accessToken),
      });
      expect(otherSession.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('POST /auth/logout without a body revokes the access token', async () => {
    const testApp = await buildTestApp();
    const { app, close } = testApp;

    try {
      await seedMember(testApp, { id: 'u1', organizationId: 'o1' });
      const { accessToken } = await login(testApp, 'u1@example.test');

      const out = await app.inject({ method: 'POST', url: '/auth/logout', headers: bearer(accessToken) });
      expect(out.statusCode).toBe(200);

      const again = await app.inject({ method: 'POST', url: '/auth/logout', headers: bearer(accessToken) });
      expect(again.statusCode).toBe(401);
      expect(readJson<ErrorBody>(again).error.code).toBe('TOKEN_REVOKED');
    } finally {
      await close();
    }
  });
});
