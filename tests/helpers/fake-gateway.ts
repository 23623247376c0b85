/**
 * In-process stand-in for the gateway's management API, served through an
 * injected fetch.
 */

import { ERROR_CODE_DEVELOPER_ALREADY_EXISTS, ERROR_CODE_DEVELOPER_DOES_NOT_EXIST } from '../../src/gateway/errors.js';
import type { AppData, DeveloperData, DeveloperStatus, GatewayConfig } from '../../src/gateway/types.js';

export const TEST_ENDPOINT = 'https://gateway.test/v1';
export const TEST_ORGANIZATION = 'test-org';

export const TEST_GATEWAY_CONFIG: GatewayConfig = {
  endpoint: TEST_ENDPOINT,
  organization: TEST_ORGANIZATION,
  auth: { type: 'basic', username: 'test-user', password: 'test-secret' },
};

export interface RecordedCall {
  method: string;
  /** Decoded path below the organization, without the query string */
  path: string;
  query: Record<string, string>;
  body: string | null;
  headers: Record<string, string>;
}

type Failure = { kind: 'network' } | { kind: 'http'; status: number; code?: string; message?: string };

function json(status: number, data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function inputUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

export class FakeGateway {
  readonly calls: RecordedCall[] = [];
  private developers: DeveloperData[] = [];
  private apps: Map<string, AppData[]> = new Map();
  private failures: Failure[] = [];
  private nextId = 1;

  /**
   * The list endpoint leaves company memberships out, like the real one.
   */
  listOmitsCompanies = true;

  readonly fetch: typeof fetch = async (input, init) => {
    const url = new URL(inputUrl(input));
    const prefix = new URL(`${TEST_ENDPOINT}/organizations/${TEST_ORGANIZATION}`).pathname;
    const rawPath = url.pathname.startsWith(prefix) ? url.pathname.slice(prefix.length) : url.pathname;
    const path = decodeURIComponent(rawPath);
    const method = init?.method ?? 'GET';
    const body = typeof init?.body === 'string' ? init.body : null;

    this.calls.push({
      method,
      path,
      query: Object.fromEntries(url.searchParams.entries()),
      body,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
    });

    const failure = this.failures.shift();
    if (failure) {
      if (failure.kind === 'network') {
        throw new TypeError('fetch failed');
      }
      return json(failure.status, { code: failure.code ?? 'gateway.Error', message: failure.message ?? 'Gateway error' });
    }

    return this.route(method, rawPath, url.searchParams, body);
  };

  addDeveloper(data: DeveloperData): DeveloperData {
    const developer: DeveloperData = {
      status: 'active',
      organizationName: TEST_ORGANIZATION,
      apps: [],
      companies: [],
      attributes: [],
      createdAt: 1700000000000,
      lastModifiedAt: 1700000000000,
      ...data,
      developerId: data.developerId ?? this.newId(),
    };
    this.developers.push(developer);
    return developer;
  }

  getDeveloper(idOrEmail: string): DeveloperData | null {
    return this.find(idOrEmail);
  }

  setCompanies(idOrEmail: string, companies: string[]): void {
    const developer = this.find(idOrEmail);
    if (!developer) {
      throw new Error(`No developer ${idOrEmail}`);
    }
    developer.companies = [...companies];
  }

  addApp(developerId: string, app: AppData): void {
    const apps = this.apps.get(developerId) ?? [];
    apps.push({ developerId, status: 'approved', ...app });
    this.apps.set(developerId, apps);
  }

  /**
   * Make the next request fail.
   */
  failNext(failure: Failure = { kind: 'http', status: 500 }): void {
    this.failures.push(failure);
  }

  /**
   * Requests matching a method and path.
   */
  count(method: string, path: string): number {
    return this.calls.filter((call) => call.method === method && call.path === path).length;
  }

  private newId(): string {
    return `00000000-0000-4000-8000-${String(this.nextId++).padStart(12, '0')}`;
  }

  private find(idOrEmail: string): DeveloperData | null {
    const needle = idOrEmail.toLowerCase();
    return (
      this.developers.find(
        (d) => d.developerId === idOrEmail || (d.email !== undefined && d.email.toLowerCase() === needle)
      ) ?? null
    );
  }

  private notFound(id: string): Response {
    return json(404, {
      code: ERROR_CODE_DEVELOPER_DOES_NOT_EXIST,
      message: `DeveloperId ${id} does not exist in organization ${TEST_ORGANIZATION}`,
    });
  }

  private route(method: string, path: string, query: URLSearchParams, body: string | null): Response {
    const segments = path.split('/').filter(Boolean).map((s) => decodeURIComponent(s));

    if (segments[0] !== 'developers') {
      return json(404, { message: 'Unknown resource' });
    }

    if (segments.length === 1) {
      if (method === 'GET') {
        const developers = this.developers.map((d) =>
          this.listOmitsCompanies ? { ...d, companies: [] } : { ...d }
        );
        return json(200, { developer: developers });
      }
      if (method === 'POST') {
        const data: DeveloperData = JSON.parse(body ?? '{}');
        if (data.email && this.find(data.email)) {
          return json(409, {
            code: ERROR_CODE_DEVELOPER_ALREADY_EXISTS,
            message: `Developer with email ${data.email} already exists`,
          });
        }
        return json(201, this.addDeveloper({ ...data, developerId: undefined }));
      }
    }

    const id = segments[1];
    const developer = this.find(id);
    if (!developer) {
      return this.notFound(id);
    }

    if (segments.length === 2) {
      switch (method) {
        case 'GET':
          return json(200, developer);
        case 'PUT': {
          const data: DeveloperData = JSON.parse(body ?? '{}');
          // Status only changes through the action endpoint
          const { status: _status, developerId: _developerId, ...updates } = data;
          Object.assign(developer, updates, { lastModifiedAt: developer.lastModifiedAt });
          return json(200, developer);
        }
        case 'POST': {
          const action = query.get('action');
          if (action === 'active' || action === 'inactive') {
            const status: DeveloperStatus = action;
            developer.status = status;
            return new Response(null, { status: 204 });
          }
          return json(400, { message: 'Unknown action' });
        }
        case 'DELETE':
          this.developers = this.developers.filter((d) => d !== developer);
          return json(200, developer);
      }
    }

    if (segments.length === 3 && segments[2] === 'apps' && method === 'GET') {
      return json(200, { app: this.apps.get(developer.developerId ?? '') ?? [] });
    }

    return json(404, { message: 'Unknown resource' });
  }
}
