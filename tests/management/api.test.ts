import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InMemoryAccountStore } from '../../src/accounts/store.js';
import { MemoryLogger } from '../../src/logging/logger.js';
import { CURRENT_USER_HEADER } from '../../src/management/api.js';
import { PortalServer } from '../../src/runtime/server.js';
import { FakeGateway, TEST_GATEWAY_CONFIG } from '../helpers/fake-gateway.js';

const ROOT_KEY = 'test-root-key';

describe('PortalApi', () => {
  let gateway: FakeGateway;
  let accounts: InMemoryAccountStore;
  let logger: MemoryLogger;
  let server: PortalServer;
  let baseUrl: string;

  beforeEach(async () => {
    gateway = new FakeGateway();
    accounts = new InMemoryAccountStore();
    logger = new MemoryLogger();
    server = new PortalServer(
      {
        port: 0,
        baseUrl: 'https://portal.test',
        gateway: TEST_GATEWAY_CONFIG,
        privateDir: '/nonexistent',
        rootKey: ROOT_KEY,
      },
      { fetch: gateway.fetch, accounts, logger }
    );
    await server.start();
    baseUrl = `http://localhost:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  function call(method: string, path: string, body?: unknown, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${ROOT_KEY}`,
        'Content-Type': 'application/json',
        ...headers,
      },
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
    });
  }

  describe('authentication', () => {
    it('requires a bearer key', async () => {
      const res = await fetch(`${baseUrl}/api/developers`);

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'Missing or invalid Authorization header' });
    });

    it('rejects unknown keys', async () => {
      const res = await call('GET', '/api/developers', undefined, { Authorization: 'Bearer portal_unknown' });
      expect(res.status).toBe(401);
    });

    it('checks key permissions', async () => {
      const created = server.keys.createApiKey({ name: 'reader', permissions: ['developers:read'] });

      const read = await call('GET', '/api/developers', undefined, { Authorization: `Bearer ${created.key}` });
      const write = await call(
        'POST',
        '/api/developers',
        { email: 'a@example.com', firstName: 'A', lastName: 'B', userName: 'ab' },
        { Authorization: `Bearer ${created.key}` }
      );

      expect(read.status).toBe(200);
      expect(write.status).toBe(403);
    });

    it('answers unknown api paths with 404', async () => {
      const res = await call('GET', '/api/nothing');
      expect(res.status).toBe(404);
    });
  });

  describe('api keys', () => {
    it('creates, lists and deletes keys', async () => {
      const createRes = await call('POST', '/api/keys', { name: 'apps', permissions: ['apps:read'] });
      expect(createRes.status).toBe(201);
      const created = (await createRes.json()) as { id: string; key: string };
      expect(created.key).toMatch(/^portal_/);

      const listRes = await call('GET', '/api/keys');
      const list = (await listRes.json()) as { keys: { id: string }[] };
      expect(list.keys.map((k) => k.id)).toEqual(['root', created.id]);

      expect((await call('DELETE', `/api/keys/${created.id}`)).status).toBe(200);
      expect((await call('DELETE', '/api/keys/root')).status).toBe(404);
    });

    it('rejects unknown permissions', async () => {
      const res = await call('POST', '/api/keys', { name: 'bad', permissions: ['everything'] });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Unknown permissions: everything' });
    });
  });

  describe('developers', () => {
    it('creates a developer and links its owner', async () => {
      const owner = accounts.create({ email: 'ada@example.com', name: 'ada' });

      const res = await call('POST', '/api/developers', {
        email: 'ada@example.com',
        firstName: 'Ada',
        lastName: 'Lovelace',
        userName: 'ada',
        ownerId: owner.id,
      });

      expect(res.status).toBe(201);
      const body = (await res.json()) as { developerId: string; originalEmail: string; status: string };
      expect(body.developerId).toBe('00000000-0000-4000-8000-000000000001');
      expect(body.originalEmail).toBe('ada@example.com');
      expect(body.status).toBe('active');
      expect(accounts.loadById(owner.id)?.developerId).toBe('00000000-0000-4000-8000-000000000001');
    });

    it('rejects incomplete developers', async () => {
      const res = await call('POST', '/api/developers', { email: 'ada@example.com' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'email, firstName, lastName, and userName are required' });
    });

    it('rejects invalid JSON', async () => {
      const res = await call('POST', '/api/developers', '{not json');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
    });

    it('reports duplicates as conflicts', async () => {
      gateway.addDeveloper({ email: 'taken@example.com' });

      const res = await call('POST', '/api/developers', {
        email: 'taken@example.com',
        firstName: 'T',
        lastName: 'K',
        userName: 'tk',
      });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: 'Developer with taken@example.com email address already exists.' });
    });

    it('lists developers', async () => {
      gateway.addDeveloper({ email: 'a@example.com' });
      gateway.addDeveloper({ email: 'b@example.com' });

      const res = await call('GET', '/api/developers');
      const body = (await res.json()) as { developers: { email: string }[] };

      expect(body.developers.map((d) => d.email)).toEqual(['a@example.com', 'b@example.com']);
    });

    it('gets a developer with its owner', async () => {
      gateway.addDeveloper({ email: 'ada@example.com', firstName: 'Ada' });
      const owner = accounts.create({ email: 'ada@example.com', name: 'ada' });

      const res = await call('GET', '/api/developers/ada%40example.com');
      const body = (await res.json()) as { firstName: string; ownerId: number };

      expect(res.status).toBe(200);
      expect(body.firstName).toBe('Ada');
      expect(body.ownerId).toBe(owner.id);
    });

    it('answers 404 for unknown developers', async () => {
      const res = await call('GET', '/api/developers/nobody%40example.com');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Developer not found' });
    });

    it('returns the companies of a developer', async () => {
      gateway.addDeveloper({ email: 'ada@example.com', companies: ['acme'] });

      const res = await call('GET', '/api/developers/ada%40example.com/companies');

      expect(await res.json()).toEqual({ companies: ['acme'] });
    });

    it('updates a developer', async () => {
      gateway.addDeveloper({ email: 'ada@example.com', firstName: 'Ada' });

      const res = await call('PUT', '/api/developers/ada%40example.com', { firstName: 'Augusta', status: 'inactive' });
      const body = (await res.json()) as { firstName: string; status: string };

      expect(res.status).toBe(200);
      expect(body.firstName).toBe('Augusta');
      expect(body.status).toBe('inactive');
      expect(gateway.getDeveloper('ada@example.com')?.status).toBe('inactive');
    });

    it('rejects unknown statuses', async () => {
      const res = await call('PUT', '/api/developers/ada%40example.com', { status: 'paused' });
      expect(res.status).toBe(400);
    });

    it('deletes a developer and unlinks its owner', async () => {
      const remote = gateway.addDeveloper({ email: 'ada@example.com' });
      const owner = accounts.create({ email: 'ada@example.com', name: 'ada', developerId: remote.developerId });

      const res = await call('DELETE', '/api/developers/ada%40example.com');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ deleted: true });
      expect(gateway.getDeveloper('ada@example.com')).toBeNull();
      expect(accounts.loadById(owner.id)?.developerId).toBeNull();
    });

    it('maps gateway failures to 502 and logs them', async () => {
      gateway.failNext({ kind: 'http', status: 500, message: 'Gateway error' });

      const res = await call('GET', '/api/developers');

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: 'Gateway error' });
      expect(logger.messages('error')).toEqual(['GET /api/developers failed. ApiException: Gateway error']);
    });
  });

  describe('user apps', () => {
    it('renders the app listing of a user', async () => {
      const remote = gateway.addDeveloper({ email: 'ada@example.com' });
      const developerId = remote.developerId ?? '';
      const owner = accounts.create({ email: 'ada@example.com', name: 'ada', developerId });
      gateway.addApp(developerId, { appId: 'app-1', name: 'weather' });

      const res = await call('GET', `/api/users/${owner.id}/apps`);
      const body = (await res.json()) as { title: string; table: { rows: { id: string; status: string }[] } };

      expect(res.status).toBe(200);
      expect(body.title).toBe('My Apps');
      expect(body.table.rows).toHaveLength(1);
      expect(body.table.rows[0].id).toBe('weather');
      expect(body.table.rows[0].status).toBe('Approved');
    });

    it('renders as the acting user', async () => {
      const remote = gateway.addDeveloper({ email: 'ada@example.com' });
      const owner = accounts.create({ email: 'ada@example.com', name: 'ada', developerId: remote.developerId });
      const viewer = accounts.create({ email: 'viewer@example.com', name: 'viewer' });

      const res = await call('GET', `/api/users/${owner.id}/apps`, undefined, {
        [CURRENT_USER_HEADER]: String(viewer.id),
      });
      const body = (await res.json()) as { title: string; addLink: unknown };

      expect(body.title).toBe('Apps of ada');
      expect(body.addLink).toBeNull();
    });

    it('answers 404 for accounts without a developer', async () => {
      const account = accounts.create({ email: 'nodev@example.com', name: 'nodev' });

      const res = await call('GET', `/api/users/${account.id}/apps`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Developer with nodev@example.com email address not found.' });
    });

    it('answers 404 for unknown users', async () => {
      const res = await call('GET', '/api/users/99/apps');
      expect(res.status).toBe(404);
    });
  });
});
