import { vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { SessionHttpServer, type SessionHttpServerOptions } from '../../src/server/session-http-server.js';
import { BASE_PATH, EDITOR, createSessionHarness, type SessionHarness } from '../helpers/session-harness.js';

interface WireSession {
  name: string;
  identifier: string;
  csrfToken: string;
  _href: string;
}

const CLEAR_COOKIE = 'SESSID=deleted; Path=/; Expires=Thu, 01 Jan 1970 00:00:00 GMT; HttpOnly; SameSite=Lax';

function isWireSession(value: unknown): value is WireSession {
  return (
    typeof value === 'object' &&
    value !== null &&
    'identifier' in value &&
    typeof value.identifier === 'string' &&
    'csrfToken' in value &&
    typeof value.csrfToken === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    '_href' in value &&
    typeof value._href === 'string'
  );
}

describe('Session routes', () => {
  let harness: SessionHarness;
  let server: SessionHttpServer;
  let app: Express;

  function createServer(overrides: Partial<SessionHttpServerOptions> = {}): void {
    harness = createSessionHarness({
      basePath: overrides.basePath ?? BASE_PATH,
      cookieName: overrides.cookieName ?? 'SESSID',
    });
    server = new SessionHttpServer(
      {
        port: 0,
        host: '127.0.0.1',
        basePath: BASE_PATH,
        cookieName: 'SESSID',
        cookieSecure: false,
        storeType: 'memory',
        ...overrides,
      },
      harness.manager
    );
    app = server.getApp();
  }

  beforeEach(() => {
    createServer();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await server.stop();
  });

  async function login(headers: Record<string, string> = {}): Promise<WireSession> {
    const response = await request(app)
      .post(`${BASE_PATH}/sessions`)
      .set(headers)
      .send({ SessionInput: EDITOR });
    const session: unknown = response.body.Session;
    if (!isWireSession(session)) {
      throw new Error(`login failed with status ${response.status}`);
    }
    return session;
  }

  function refresh(session: WireSession, csrfToken: string | null = session.csrfToken) {
    const pending = request(app)
      .post(`${BASE_PATH}/sessions/${session.identifier}/refresh`)
      .set('Cookie', `${session.name}=${session.identifier}`);
    return csrfToken === null ? pending : pending.set('X-CSRF-Token', csrfToken);
  }

  function remove(session: WireSession, csrfToken: string | null = session.csrfToken) {
    const pending = request(app)
      .delete(session._href)
      .set('Cookie', `${session.name}=${session.identifier}`);
    return csrfToken === null ? pending : pending.set('X-CSRF-Token', csrfToken);
  }

  describe('POST /sessions', () => {
    it('creates a session and sets the session cookie', async () => {
      const response = await request(app)
        .post(`${BASE_PATH}/sessions`)
        .send({ SessionInput: EDITOR });

      expect(response.status).toBe(201);
      const session: unknown = response.body.Session;
      expect(isWireSession(session)).toBe(true);
      if (!isWireSession(session)) return;

      expect(session.name).toBe('SESSID');
      expect(session._href).toBe(`${BASE_PATH}/sessions/${session.identifier}`);
      expect(response.body.Session.User).toEqual({ _href: `${BASE_PATH}/users/editor` });
      expect(response.headers.location).toBe(session._href);
      expect(response.headers['set-cookie']).toEqual([
        `SESSID=${session.identifier}; Path=/; HttpOnly; SameSite=Lax`,
      ]);
    });

    it('accepts a login body sent with a vendor +json media type', async () => {
      const response = await request(app)
        .post(`${BASE_PATH}/sessions`)
        .set('Content-Type', 'application/vnd.example.api.SessionInput+json')
        .set('Accept', 'application/vnd.example.api.Session+json')
        .send(JSON.stringify({ SessionInput: EDITOR }));

      expect(response.status).toBe(201);
      expect(response.body.Session.name).toBe('SESSID');
      expect(response.body.Session.User).toEqual({ _href: `${BASE_PATH}/users/editor` });
    });

    it('adds the Secure attribute when configured', async () => {
      await server.stop();
      createServer({ cookieSecure: true });

      const response = await request(app)
        .post(`${BASE_PATH}/sessions`)
        .send({ SessionInput: EDITOR });

      expect(response.status).toBe(201);
      expect(response.headers['set-cookie']).toEqual([
        `SESSID=${response.body.Session.identifier}; Path=/; HttpOnly; Secure; SameSite=Lax`,
      ]);
    });

    it('rejects bad credentials with 401 and no cookie', async () => {
      const response = await request(app)
        .post(`${BASE_PATH}/sessions`)
        .send({ SessionInput: { login: 'editor', password: 'bad-password' } });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ error: 'Unauthorized', message: 'Invalid login or password' });
      expect(response.headers['set-cookie']).toBeUndefined();
      expect(await harness.manager.stats()).toBe(0);
    });

    it.each([
      ['an empty body', undefined],
      ['a missing SessionInput', { login: 'editor', password: 'test-password' }],
      ['an empty password', { SessionInput: { login: 'editor', password: '' } }],
    ])('rejects %s with 400', async (_label, body) => {
      const pending = request(app).post(`${BASE_PATH}/sessions`);
      const response = body === undefined ? await pending : await pending.send(body);

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid Request');
    });

    it('rejects malformed JSON with 400', async () => {
      const response = await request(app)
        .post(`${BASE_PATH}/sessions`)
        .set('Content-Type', 'application/json')
        .send('{"SessionInput":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Invalid Request', message: 'Malformed request' });
    });

    it('answers 200 when re-login presents the session cookie and CSRF token', async () => {
      const first = await login();

      const response = await request(app)
        .post(`${BASE_PATH}/sessions`)
        .set('Cookie', `SESSID=${first.identifier}`)
        .set('X-CSRF-Token', first.csrfToken)
        .send({ SessionInput: EDITOR });

      expect(response.status).toBe(200);
      expect(response.body.Session.identifier).toBe(first.identifier);
      expect(response.headers.location).toBeUndefined();
      expect(response.headers['set-cookie']).toEqual([
        `SESSID=${first.identifier}; Path=/; HttpOnly; SameSite=Lax`,
      ]);
    });

    it('answers 201 with a new session for a cookie without CSRF token', async () => {
      const frontend = await login();

      const response = await request(app)
        .post(`${BASE_PATH}/sessions`)
        .set('Cookie', `SESSID=${frontend.identifier}`)
        .send({ SessionInput: EDITOR });

      expect(response.status).toBe(201);
      expect(response.body.Session.identifier).not.toBe(frontend.identifier);

      const previous = await request(app)
        .get(`${BASE_PATH}/sessions/current`)
        .set('Cookie', `SESSID=${frontend.identifier}`);
      expect(previous.status).toBe(404);
    });

    it('rejects re-login with a mismatched CSRF token', async () => {
      const first = await login();

      const response = await request(app)
        .post(`${BASE_PATH}/sessions`)
        .set('Cookie', `SESSID=${first.identifier}`)
        .set('X-CSRF-Token', 'wrong-token')
        .send({ SessionInput: EDITOR });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ error: 'Unauthorized', message: 'Missing or invalid CSRF token' });
    });
  });

  describe('GET /sessions/current', () => {
    it('answers 404 with an empty body without a session cookie', async () => {
      const response = await request(app).get(`${BASE_PATH}/sessions/current`);

      expect(response.status).toBe(404);
      expect(response.text).toBe('');
    });

    it('answers 404 with an empty body for an unknown session', async () => {
      const response = await request(app)
        .get(`${BASE_PATH}/sessions/current`)
        .set('Cookie', 'SESSID=unknown-session');

      expect(response.status).toBe(404);
      expect(response.text).toBe('');
    });

    it('returns the session named by the cookie', async () => {
      const session = await login();

      const response = await request(app)
        .get(`${BASE_PATH}/sessions/current`)
        .set('Cookie', `SESSID=${session.identifier}`)
        .set('X-CSRF-Token', session.csrfToken);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        Session: {
          name: 'SESSID',
          identifier: session.identifier,
          csrfToken: session.csrfToken,
          _href: session._href,
          User: { _href: `${BASE_PATH}/users/editor` },
        },
      });
    });
  });

  describe('POST /sessions/:identifier/refresh', () => {
    it('refreshes a live session', async () => {
      const session = await login();

      const response = await refresh(session);

      expect(response.status).toBe(200);
      expect(response.body.Session.identifier).toBe(session.identifier);
      expect(response.body.Session.csrfToken).toBe(session.csrfToken);
    });

    it('rejects a missing CSRF token with 401', async () => {
      const session = await login();

      const response = await refresh(session, null);

      expect(response.status).toBe(401);
      expect(response.headers['set-cookie']).toBeUndefined();
    });

    it('rejects a missing CSRF token with 401 even for an unknown session', async () => {
      const response = await request(app)
        .post(`${BASE_PATH}/sessions/unknown-session/refresh`)
        .set('Cookie', 'SESSID=unknown-session');

      expect(response.status).toBe(401);
    });

    it('rejects a mismatched CSRF token with 401', async () => {
      const session = await login();

      const response = await refresh(session, 'wrong-token');

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Missing or invalid CSRF token');
    });

    it('answers 404 and clears the cookie when the path names another session', async () => {
      const mine = await login();
      const other = await login();

      const response = await request(app)
        .post(`${BASE_PATH}/sessions/${other.identifier}/refresh`)
        .set('Cookie', `SESSID=${mine.identifier}`)
        .set('X-CSRF-Token', other.csrfToken);

      expect(response.status).toBe(404);
      expect(response.headers['set-cookie']).toEqual([CLEAR_COOKIE]);
    });
  });

  describe('DELETE /sessions/:identifier', () => {
    it('deletes the session and clears the cookie', async () => {
      const session = await login();

      const response = await remove(session);

      expect(response.status).toBe(204);
      expect(response.text).toBe('');
      expect(response.headers['set-cookie']).toEqual([CLEAR_COOKIE]);
      expect(await harness.manager.stats()).toBe(0);
    });

    it('rejects a missing CSRF token with 401 and keeps the session', async () => {
      const session = await login();

      const response = await remove(session, null);

      expect(response.status).toBe(401);
      expect(response.headers['set-cookie']).toBeUndefined();
      expect(await harness.manager.stats()).toBe(1);
    });

    it('answers 404, clears the cookie and keeps the target when the path names another session', async () => {
      const mine = await login();
      const other = await login();

      const response = await request(app)
        .delete(other._href)
        .set('Cookie', `SESSID=${mine.identifier}`)
        .set('X-CSRF-Token', other.csrfToken);

      expect(response.status).toBe(404);
      expect(response.headers['set-cookie']).toEqual([CLEAR_COOKIE]);

      const target = await request(app)
        .get(`${BASE_PATH}/sessions/current`)
        .set('Cookie', `SESSID=${other.identifier}`);
      expect(target.status).toBe(200);
      expect(target.body.Session.identifier).toBe(other.identifier);
    });

    it('rejects a missing CSRF token with 401 even for an unknown session', async () => {
      const response = await request(app)
        .delete(`${BASE_PATH}/sessions/unknown-session`)
        .set('Cookie', 'SESSID=unknown-session');

      expect(response.status).toBe(401);
    });
  });

  it('runs the full lifecycle: create, refresh, delete, then 404s that clear the cookie', async () => {
    const created = await request(app)
      .post(`${BASE_PATH}/sessions`)
      .send({ SessionInput: EDITOR });
    expect(created.status).toBe(201);
    const session: unknown = created.body.Session;
    if (!isWireSession(session)) {
      throw new Error('missing session body');
    }
    expect(session.identifier).not.toBe('');
    expect(session.csrfToken).not.toBe('');

    expect((await refresh(session)).status).toBe(200);

    const deleted = await remove(session);
    expect(deleted.status).toBe(204);
    expect(deleted.headers['set-cookie']).toEqual([CLEAR_COOKIE]);

    const refreshedAfterDelete = await refresh(session);
    expect(refreshedAfterDelete.status).toBe(404);
    expect(refreshedAfterDelete.headers['set-cookie']).toEqual([CLEAR_COOKIE]);

    const deletedAgain = await remove(session);
    expect(deletedAgain.status).toBe(404);
    expect(deletedAgain.headers['set-cookie']).toEqual([CLEAR_COOKIE]);
  });

  it('serves the routes at the root when the base path is empty', async () => {
    await server.stop();
    createServer({ basePath: '', cookieName: 'CMSSESSION' });

    const response = await request(app)
      .post('/sessions')
      .send({ SessionInput: EDITOR });

    expect(response.status).toBe(201);
    expect(response.body.Session._href).toBe(`/sessions/${response.body.Session.identifier}`);
    expect(response.body.Session.User).toEqual({ _href: '/users/editor' });
    expect(response.headers['set-cookie']).toEqual([
      `CMSSESSION=${response.body.Session.identifier}; Path=/; HttpOnly; SameSite=Lax`,
    ]);
  });

  it('answers 500 without details when the store fails', async () => {
    vi.spyOn(harness.store, 'get').mockRejectedValue(new Error('connection lost'));

    const response = await request(app)
      .get(`${BASE_PATH}/sessions/current`)
      .set('Cookie', 'SESSID=some-session');

    expect(response.status).toBe(500);
    expect(response.body.error).toBe('Internal server error');
    expect(response.body.message).toBe('Something went wrong');
  });

  it('includes error details when enabled', async () => {
    await server.stop();
    createServer({ exposeErrorDetails: true });
    vi.spyOn(harness.store, 'get').mockRejectedValue(new Error('connection lost'));

    const response = await request(app)
      .get(`${BASE_PATH}/sessions/current`)
      .set('Cookie', 'SESSID=some-session');

    expect(response.status).toBe(500);
    expect(response.body.message).toBe('connection lost');
  });

  it('answers unknown routes with a JSON 404', async () => {
    const response = await request(app).get(`${BASE_PATH}/unknown`);

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Not Found', message: `No route for GET ${BASE_PATH}/unknown` });
  });
});
