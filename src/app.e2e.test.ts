import type { NestExpressApplication } from '@nestjs/platform-express';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG } from './config/configuration';
import {
  createProviderStrategy,
  OAUTH_STRATEGY_FACTORY,
  type OAuthStrategyFactory,
} from './oauth/provider-registry';
import { PickupsService } from './pickups/pickups.service';
import { QueueService } from './queue/queue.service';
import { FakeOAuthProvider } from './testing/fake-oauth-provider';
import { buildCreatePickupDto } from './testing/fixtures';
import { createTestConfig } from './testing/test-config';

async function createApp(
  env: Record<string, string>,
  provider?: FakeOAuthProvider,
): Promise<NestExpressApplication> {
  // Real passport strategies, pointed at the in-process provider
  const strategyFactory: OAuthStrategyFactory = (definition, options) =>
    createProviderStrategy(definition, {
      ...options,
      endpoints: provider ? provider.endpoints(definition.name) : options.endpoints,
    });

  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(APP_CONFIG)
    .useValue(createTestConfig(env))
    .overrideProvider(OAUTH_STRATEGY_FACTORY)
    .useValue(strategyFactory)
    .compile();

  const app = moduleRef.createNestApplication<NestExpressApplication>({ logger: false });
  configureApp(app);
  await app.init();
  return app;
}

function setCookies(res: request.Response): string[] {
  const header: unknown = res.headers['set-cookie'];
  const cookies: unknown[] = Array.isArray(header) ? header : [];
  return cookies.filter((cookie): cookie is string => typeof cookie === 'string');
}

function setCookie(res: request.Response, name: string): string | undefined {
  return setCookies(res).find((cookie) => cookie.startsWith(`${name}=`));
}

function cookieValue(res: request.Response, name: string): string {
  const cookie = setCookie(res, name);
  return cookie ? cookie.slice(name.length + 1).split(';')[0] : '';
}

/** The name=value pairs of every cookie the response set, as a Cookie header. */
function cookieHeader(res: request.Response): string {
  return setCookies(res)
    .map((cookie) => cookie.split(';')[0])
    .join('; ');
}

describe('HTTP API', () => {
  let app: NestExpressApplication;
  let provider: FakeOAuthProvider;

  beforeAll(async () => {
    provider = await FakeOAuthProvider.start();
    app = await createApp(
      {
        GITHUB_CLIENT_ID: 'github-id',
        GITHUB_CLIENT_SECRET: 'test-secret',
        GOOGLE_CLIENT_ID: 'google-id',
        GOOGLE_CLIENT_SECRET: 'test-secret',
      },
      provider,
    );
  });

  afterAll(async () => {
    await app.close();
    await provider.close();
  });

  describe('OAuth', () => {
    beforeEach(() => {
      provider.resources.clear();
      provider.resources.set('/github/userinfo', {
        status: 200,
        body: { login: 'octocat', name: 'Octo Cat', email: null, avatar_url: 'https://avatars.example.com/octo.png' },
      });
      provider.resources.set('/github/userinfo/emails', {
        status: 200,
        body: [{ email: 'Octo.Cat@example.com', primary: true, verified: true }],
      });
      provider.resources.set('/google/userinfo', {
        status: 200,
        body: {
          sub: '1234',
          name: 'Sam Lee',
          email: 'sam.lee@example.com',
          email_verified: true,
          picture: 'https://avatars.example.com/sam.png',
        },
      });
    });

    async function startLogin(name = 'github') {
      const res = await request(app.getHttpServer()).get(`/api/v1/login/${name}`).expect(302);
      const location = new URL(String(res.headers.location));
      return { res, location, state: location.searchParams.get('state') ?? '', cookies: cookieHeader(res) };
    }

    async function signIn(name = 'github') {
      const { state, cookies } = await startLogin(name);
      return request(app.getHttpServer())
        .get(`/api/v1/callback/${name}?code=good-code&state=${state}`)
        .set('Cookie', cookies);
    }

    it('redirects to the provider and keeps the state in a signed session cookie', async () => {
      const { res, location, state } = await startLogin();

      expect(`${location.origin}${location.pathname}`).toBe(provider.endpoints('github').authorizationURL);
      expect(location.searchParams.get('client_id')).toBe('github-id');
      expect(location.searchParams.get('response_type')).toBe('code');
      expect(location.searchParams.get('redirect_uri')).toBe('http://localhost:8000/api/v1/callback/github');
      expect(location.searchParams.get('scope')).toBe('read:user user:email');
      expect(state).not.toBe('');

      expect(setCookie(res, 'oauth_state')).toMatch(/httponly/i);
      expect(setCookie(res, 'oauth_state.sig')).toBeDefined();
    });

    it('answers a disabled provider exactly like an unknown route', async () => {
      const disabled = await request(app.getHttpServer()).get('/api/v1/login/microsoft').expect(404);
      const unknownProvider = await request(app.getHttpServer())
        .get('/api/v1/callback/gitlab?code=x')
        .expect(404);
      const unknownRoute = await request(app.getHttpServer()).get('/api/v1/not-a-route').expect(404);

      expect(disabled.body).toEqual({
        statusCode: 404,
        message: 'Cannot GET /api/v1/login/microsoft',
        error: 'Not Found',
      });
      expect(unknownProvider.body).toEqual({
        statusCode: 404,
        message: 'Cannot GET /api/v1/callback/gitlab?code=x',
        error: 'Not Found',
      });
      expect(unknownRoute.body).toEqual({
        statusCode: 404,
        message: 'Cannot GET /api/v1/not-a-route',
        error: 'Not Found',
      });
    });

    it('signs a GitHub user in on callback and hands out tokens', async () => {
      const res = await signIn().expect(200);

      expect(res.body).toEqual({ access_token: expect.any(String), token_type: 'bearer' });

      const refreshCookie = setCookie(res, 'refresh_token') ?? '';
      expect(refreshCookie).toContain('Max-Age=604800');
      expect(refreshCookie).toContain('HttpOnly');
      expect(refreshCookie).toContain('Secure');
      expect(refreshCookie).toContain('SameSite=Lax');

      const me = await request(app.getHttpServer())
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${String(res.body.access_token)}`)
        .expect(200);
      expect(me.body).toMatchObject({
        name: 'Octo Cat',
        username: 'octo.cat',
        email: 'Octo.Cat@example.com',
        profile_image_url: 'https://avatars.example.com/octo.png',
        is_superuser: false,
      });
      expect(me.body).not.toHaveProperty('password_hash');

      const refreshed = await request(app.getHttpServer())
        .post('/api/v1/refresh')
        .set('Cookie', `refresh_token=${cookieValue(res, 'refresh_token')}`)
        .expect(200);
      expect(refreshed.body).toEqual({ access_token: expect.any(String), token_type: 'bearer' });
    });

    it('signs a Google user in from the OpenID profile', async () => {
      const res = await signIn('google').expect(200);

      const me = await request(app.getHttpServer())
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${String(res.body.access_token)}`)
        .expect(200);
      expect(me.body).toMatchObject({
        name: 'Sam Lee',
        username: 'sam.lee',
        email: 'sam.lee@example.com',
        profile_image_url: 'https://avatars.example.com/sam.png',
      });
    });

    it('returns the same account on repeated logins', async () => {
      const ids: string[] = [];
      for (let i = 0; i < 2; i++) {
        const res = await signIn().expect(200);
        const me = await request(app.getHttpServer())
          .get('/api/v1/users/me')
          .set('Authorization', `Bearer ${String(res.body.access_token)}`)
          .expect(200);
        ids.push(String(me.body.id));
      }
      expect(ids[0]).toBe(ids[1]);
    });

    it('rejects a callback whose state does not match the session', async () => {
      const { cookies } = await startLogin();

      const res = await request(app.getHttpServer())
        .get('/api/v1/callback/github?code=good-code&state=forged')
        .set('Cookie', cookies)
        .expect(401);
      expect(res.body.message).toBe('Invalid authorization request state.');
    });

    it('rejects a callback without the session cookie', async () => {
      const { state } = await startLogin();

      const res = await request(app.getHttpServer())
        .get(`/api/v1/callback/github?code=good-code&state=${state}`)
        .expect(401);
      expect(res.body.message).toBe('Unable to verify authorization request state.');
    });

    it('turns a failed code exchange into 401', async () => {
      const { state, cookies } = await startLogin();

      const res = await request(app.getHttpServer())
        .get(`/api/v1/callback/github?code=bad-code&state=${state}`)
        .set('Cookie', cookies)
        .expect(401);
      expect(res.body.message).toBe('Invalid response from GitHub OAuth.');
    });

    it('turns a failing profile endpoint into 401', async () => {
      provider.resources.set('/github/userinfo', { status: 502, body: { message: 'Bad gateway' } });

      const res = await signIn().expect(401);
      expect(res.body.message).toBe('Invalid response from GitHub OAuth.');
    });

    it('does not let an OAuth account sign in with a password', async () => {
      await signIn().expect(200);

      const res = await request(app.getHttpServer())
        .post('/api/v1/login')
        .send({ username: 'octo.cat', password: '' })
        .expect(401);
      expect(res.body.message).toBe('Wrong username, email or password.');
    });
  });

  describe('password accounts', () => {
    const account = {
      name: 'Jane Smith',
      username: 'jane_smith',
      email: 'jane_smith@example.com',
      password: 'hunter2-hunter2',
    };

    it('signs up, logs in and logs out', async () => {
      const created = await request(app.getHttpServer()).post('/api/v1/users').send(account).expect(201);
      expect(created.body).toMatchObject({ username: 'jane_smith', email: 'jane_smith@example.com' });
      expect(created.body).not.toHaveProperty('password');

      await request(app.getHttpServer()).post('/api/v1/users').send(account).expect(409);

      const login = await request(app.getHttpServer())
        .post('/api/v1/login')
        .type('form')
        .send({ username: 'jane_smith@example.com', password: account.password })
        .expect(200);
      const accessToken = String(login.body.access_token);
      const refreshToken = cookieValue(login, 'refresh_token');

      await request(app.getHttpServer())
        .post('/api/v1/logout')
        .set('Authorization', `Bearer ${accessToken}`)
        .set('Cookie', `refresh_token=${refreshToken}`)
        .expect(200);

      await request(app.getHttpServer())
        .get('/api/v1/users/me')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(401);
      await request(app.getHttpServer())
        .post('/api/v1/refresh')
        .set('Cookie', `refresh_token=${refreshToken}`)
        .expect(401);
    });

    it('rejects a wrong password', async () => {
      await request(app.getHttpServer())
        .post('/api/v1/login')
        .send({ username: 'jane_smith', password: 'not-the-password' })
        .expect(401);
    });

    it('validates signup input', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/v1/users')
        .send({ ...account, username: 'Bad Name', email: 'not-an-email' })
        .expect(400);
      expect(res.body.message).toEqual(
        expect.arrayContaining(['email must be an email']),
      );
    });

    it('requires the refresh cookie', async () => {
      const res = await request(app.getHttpServer()).post('/api/v1/refresh').expect(401);
      expect(res.body.message).toBe('Refresh token missing.');
    });
  });

  describe('pickups', () => {
    const HOUR = 60 * 60 * 1000;

    it('creates, reads, lists and cancels a pickup', async () => {
      const dto = buildCreatePickupDto(new Date(Date.now() + 4 * HOUR));

      const created = await request(app.getHttpServer()).post('/api/v1/pickups').send(dto).expect(201);
      const pickupId = String(created.body.pickup_id);
      expect(pickupId).toMatch(/^pik_[A-Za-z0-9_-]{22}$/);
      expect(created.body.pickup_window).toEqual(dto.pickup_window);
      expect(created.body.pickup_address).toMatchObject({ name: 'Warehouse 7', country_code: 'US' });

      const fetched = await request(app.getHttpServer()).get(`/api/v1/pickups/${pickupId}`).expect(200);
      expect(fetched.body).toEqual(created.body);

      const list = await request(app.getHttpServer())
        .get('/api/v1/pickups?page=1&items_per_page=5')
        .expect(200);
      expect(list.body).toMatchObject({ total_count: 1, has_more: false, page: 1, items_per_page: 5 });
      expect(list.body.data).toEqual([created.body]);

      const jobId = app.get(PickupsService).getActive(pickupId).notificationJobId ?? '';
      const queue = app.get(QueueService);
      expect(queue.findJob(jobId)?.status).toBe('pending');

      const deleted = await request(app.getHttpServer()).delete(`/api/v1/pickups/${pickupId}`).expect(200);
      expect(deleted.body).toEqual({ message: 'Pickup cancelled successfully' });
      expect(queue.findJob(jobId)?.status).toBe('cancelled');

      const missing = await request(app.getHttpServer()).get(`/api/v1/pickups/${pickupId}`).expect(404);
      expect(missing.body.message).toBe('Pickup not found');
      await request(app.getHttpServer()).delete(`/api/v1/pickups/${pickupId}`).expect(404);
    });

    it('rejects invalid pickups', async () => {
      const dto = buildCreatePickupDto(new Date(Date.now() + 4 * HOUR), { label_ids: [] });
      const res = await request(app.getHttpServer()).post('/api/v1/pickups').send(dto).expect(400);
      expect(res.body.message).toEqual(['label_ids must contain at least 1 elements']);
    });

    it('rejects a pickup window on a date that does not exist', async () => {
      const dto = buildCreatePickupDto(new Date(Date.now() + 4 * HOUR));
      const res = await request(app.getHttpServer())
        .post('/api/v1/pickups')
        .send({ ...dto, pickup_window: { start_at: '2031-02-30T10:00:00Z', end_at: '2031-02-30T12:00:00Z' } })
        .expect(400);
      expect(res.body.message).toEqual([
        'pickup_window.start_at must be a valid ISO 8601 date string',
        'pickup_window.end_at must be a valid ISO 8601 date string',
      ]);
    });

    it('rejects invalid pagination', async () => {
      await request(app.getHttpServer()).get('/api/v1/pickups?page=0').expect(400);
    });
  });

  it('tags responses with a request id', async () => {
    const echoed = await request(app.getHttpServer())
      .get('/api/v1/pickups')
      .set('X-Request-ID', 'req-123')
      .expect(200);
    expect(echoed.headers['x-request-id']).toBe('req-123');

    const generated = await request(app.getHttpServer()).get('/api/v1/pickups').expect(200);
    expect(generated.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('HTTP API with password authentication disabled', () => {
  let app: NestExpressApplication;

  beforeAll(async () => {
    app = await createApp({ ENABLE_PASSWORD_AUTH: 'false' });
  });

  afterAll(async () => {
    await app.close();
  });

  it('refuses password login and signup', async () => {
    await request(app.getHttpServer())
      .post('/api/v1/login')
      .send({ username: 'someone', password: 'whatever-123' })
      .expect(403);
    await request(app.getHttpServer())
      .post('/api/v1/users')
      .send({ name: 'Someone', username: 'someone', email: 'someone@example.com', password: 'whatever-123' })
      .expect(403);
  });

  it('has no OAuth routes without configured providers', async () => {
    const res = await request(app.getHttpServer()).get('/api/v1/login/github').expect(404);
    expect(res.body.message).toBe('Cannot GET /api/v1/login/github');
  });
});
