/**
 * Management API - REST endpoints for developers, their apps and API keys
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { InMemoryAccountStore } from '../accounts/store.js';
import type { Account } from '../accounts/types.js';
import type { DeveloperStorage } from '../entity/developer-storage.js';
import type { Developer } from '../entity/developer.js';
import type { DeveloperAppController } from '../gateway/app-controller.js';
import {
  ApiException,
  ClientErrorException,
  DeveloperAlreadyExistsException,
  DeveloperDoesNotExistException,
} from '../gateway/errors.js';
import { DEVELOPER_STATUS_ACTIVE, DEVELOPER_STATUS_INACTIVE } from '../gateway/types.js';
import type { DeveloperStatus } from '../gateway/types.js';
import { DeveloperAppListBuilder } from '../listing/app-list-builder.js';
import type { Logger } from '../logging/logger.js';
import { decodeException } from '../logging/logger.js';
import type { ApiKeyStore } from './store.js';
import { API_KEY_PERMISSIONS } from './types.js';
import type {
  ApiKeyPermission,
  CreateApiKeyRequest,
  CreateDeveloperRequest,
  UpdateDeveloperRequest,
} from './types.js';

type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  params: Record<string, string>
) => Promise<void>;

interface Route {
  method: string;
  pattern: RegExp;
  handler: RouteHandler;
  permissions: ApiKeyPermission[];
}

export interface PortalApiOptions {
  keys: ApiKeyStore;
  developers: DeveloperStorage;
  apps: DeveloperAppController;
  accounts: InMemoryAccountStore;
  /** Absolute site URL */
  baseUrl: string;
  logger: Logger;
}

/** Header naming the local account a request acts as */
export const CURRENT_USER_HEADER = 'x-portal-user';

/**
 * Parse JSON body from request
 */
async function parseBody<T>(req: IncomingMessage): Promise<T> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => {
      body += chunk.toString();
    });
    req.on('end', () => {
      try {
        resolve(JSON.parse(body) as T);
      } catch {
        reject(new BadRequestError('Invalid JSON body'));
      }
    });
    req.on('error', reject);
  });
}

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

/**
 * Send error response
 */
function sendError(res: ServerResponse, status: number, message: string): void {
  sendJson(res, status, { error: message });
}

/**
 * HTTP status for an error thrown by a handler
 */
export function statusForError(error: unknown): number {
  if (error instanceof BadRequestError) return 400;
  if (error instanceof DeveloperDoesNotExistException) return 404;
  if (error instanceof DeveloperAlreadyExistsException) return 409;
  if (error instanceof ClientErrorException) return error.status === 404 ? 404 : 502;
  if (error instanceof ApiException) return 502;
  return 500;
}

function isStatus(value: unknown): value is DeveloperStatus {
  return value === DEVELOPER_STATUS_ACTIVE || value === DEVELOPER_STATUS_INACTIVE;
}

/**
 * Management API Router
 */
export class PortalApi {
  private routes: Route[] = [];
  private keys: ApiKeyStore;
  private developers: DeveloperStorage;
  private apps: DeveloperAppController;
  private accounts: InMemoryAccountStore;
  private baseUrl: string;
  private logger: Logger;

  constructor(options: PortalApiOptions) {
    this.keys = options.keys;
    this.developers = options.developers;
    this.apps = options.apps;
    this.accounts = options.accounts;
    this.baseUrl = options.baseUrl;
    this.logger = options.logger;
    this.setupRoutes();
  }

  private setupRoutes(): void {
    // API Keys
    this.route('POST', /^\/api\/keys$/, this.createApiKey, ['admin']);
    this.route('GET', /^\/api\/keys$/, this.listApiKeys, ['admin']);
    this.route('DELETE', /^\/api\/keys\/(?<id>[^/]+)$/, this.deleteApiKey, ['admin']);

    // Developers
    this.route('GET', /^\/api\/developers$/, this.listDevelopers, ['developers:read']);
    this.route('POST', /^\/api\/developers$/, this.createDeveloper, ['developers:write']);
    this.route('GET', /^\/api\/developers\/(?<id>[^/]+)$/, this.getDeveloper, ['developers:read']);
    this.route('PUT', /^\/api\/developers\/(?<id>[^/]+)$/, this.updateDeveloper, ['developers:write']);
    this.route('DELETE', /^\/api\/developers\/(?<id>[^/]+)$/, this.deleteDeveloper, ['developers:write']);
    this.route(
      'GET',
      /^\/api\/developers\/(?<id>[^/]+)\/companies$/,
      this.getDeveloperCompanies,
      ['developers:read']
    );

    // Apps of a user
    this.route('GET', /^\/api\/users\/(?<uid>\d+)\/apps$/, this.listUserApps, ['apps:read']);
  }

  private route(method: string, pattern: RegExp, handler: RouteHandler, permissions: ApiKeyPermission[]): void {
    this.routes.push({ method, pattern, handler: handler.bind(this), permissions });
  }

  /**
   * Handle incoming request
   * Returns true if handled, false if not a management API route
   */
  async handle(req: IncomingMessage, res: ServerResponse): Promise<boolean> {
    const url = new URL(req.url || '/', `http://${req.headers.host}`);
    const path = url.pathname;

    if (!path.startsWith('/api/')) {
      return false;
    }

    for (const route of this.routes) {
      if (req.method !== route.method) continue;

      const match = path.match(route.pattern);
      if (!match) continue;

      const authHeader = req.headers.authorization;
      if (!authHeader?.startsWith('Bearer ')) {
        sendError(res, 401, 'Missing or invalid Authorization header');
        return true;
      }

      const apiKey = this.keys.validateApiKey(authHeader.slice(7));
      if (!apiKey) {
        sendError(res, 401, 'Invalid API key');
        return true;
      }

      const hasPermission = route.permissions.some((p) => this.keys.hasPermission(apiKey, p));
      if (!hasPermission) {
        sendError(res, 403, 'Insufficient permissions');
        return true;
      }

      try {
        const params: Record<string, string> = {};
        for (const [name, value] of Object.entries(match.groups || {})) {
          params[name] = decodeURIComponent(value);
        }
        await route.handler(req, res, params);
      } catch (error) {
        const status = statusForError(error);
        if (status >= 500) {
          this.logger.error('%method %path failed. %type: @message', {
            '%method': req.method,
            '%path': path,
            ...decodeException(error),
          });
        }
        const message = error instanceof Error ? error.message : 'Internal error';
        sendError(res, status, message);
      }

      return true;
    }

    sendError(res, 404, 'Not found');
    return true;
  }

  // ============ API Key Handlers ============

  private async createApiKey(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await parseBody<CreateApiKeyRequest>(req);

    if (!body.name || !body.permissions?.length) {
      sendError(res, 400, 'name and permissions are required');
      return;
    }
    const unknown = body.permissions.filter((p) => !API_KEY_PERMISSIONS.includes(p));
    if (unknown.length > 0) {
      sendError(res, 400, `Unknown permissions: ${unknown.join(', ')}`);
      return;
    }

    sendJson(res, 201, this.keys.createApiKey(body));
  }

  private async listApiKeys(_req: IncomingMessage, res: ServerResponse): Promise<void> {
    sendJson(res, 200, { keys: this.keys.listApiKeys() });
  }

  private async deleteApiKey(
    _req: IncomingMessage,
    res: ServerResponse,
    params: Record<string, string>
  ): Promise<void> {
    if (!this.keys.deleteApiKey(params.id)) {
      sendError(res, 404, 'API key not found or cannot be deleted');
      return;
    }
    sendJson(res, 200, { deleted: true });
  }

  // ============ Developer Handlers ============

  private async listDevelopers(_req: IncomingMessage, res: ServerResponse): Promise<void> {
    const developers = await this.developers.loadMultiple();
    sendJson(res, 200, { developers: developers.map((developer) => developer.toJSON()) });
  }

  private async getDeveloper(
    _req: IncomingMessage,
    res: ServerResponse,
    params: Record<string, string>
  ): Promise<void> {
    const developer = await this.developers.load(params.id);
    if (!developer) {
      sendError(res, 404, 'Developer not found');
      return;
    }
    sendJson(res, 200, { ...developer.toJSON(), ownerId: developer.getOwnerId() });
  }

  private async getDeveloperCompanies(
    _req: IncomingMessage,
    res: ServerResponse,
    params: Record<string, string>
  ): Promise<void> {
    const developer = await this.developers.load(params.id);
    if (!developer) {
      sendError(res, 404, 'Developer not found');
      return;
    }
    sendJson(res, 200, { companies: await developer.getCompanies() });
  }

  private async createDeveloper(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await parseBody<CreateDeveloperRequest>(req);

    if (!body.email || !body.firstName || !body.lastName || !body.userName) {
      sendError(res, 400, 'email, firstName, lastName, and userName are required');
      return;
    }
    if (body.status !== undefined && !isStatus(body.status)) {
      sendError(res, 400, 'status must be active or inactive');
      return;
    }

    let owner: Account | null = null;
    if (body.ownerId !== undefined) {
      owner = this.accounts.loadById(body.ownerId);
      if (!owner) {
        sendError(res, 400, `Account ${body.ownerId} does not exist`);
        return;
      }
    }

    const developer = this.developers.create({
      email: body.email,
      firstName: body.firstName,
      lastName: body.lastName,
      userName: body.userName,
      status: body.status,
      attributes: body.attributes,
    });
    if (owner) {
      developer.setOwner(owner);
    }

    const saved = await this.developers.save(developer);
    this.linkOwner(saved);
    sendJson(res, 201, saved.toJSON());
  }

  private async updateDeveloper(
    req: IncomingMessage,
    res: ServerResponse,
    params: Record<string, string>
  ): Promise<void> {
    const body = await parseBody<UpdateDeveloperRequest>(req);
    if (body.status !== undefined && !isStatus(body.status)) {
      sendError(res, 400, 'status must be active or inactive');
      return;
    }

    const developer = await this.developers.load(params.id);
    if (!developer) {
      sendError(res, 404, 'Developer not found');
      return;
    }

    if (body.email !== undefined) developer.setEmail(body.email);
    if (body.firstName !== undefined) developer.setFirstName(body.firstName);
    if (body.lastName !== undefined) developer.setLastName(body.lastName);
    if (body.userName !== undefined) developer.setUserName(body.userName);
    if (body.status !== undefined) developer.setStatus(body.status);

    const saved = await this.developers.save(developer);
    sendJson(res, 200, saved.toJSON());
  }

  private async deleteDeveloper(
    _req: IncomingMessage,
    res: ServerResponse,
    params: Record<string, string>
  ): Promise<void> {
    const developer = await this.developers.load(params.id);
    if (!developer) {
      sendError(res, 404, 'Developer not found');
      return;
    }

    const ownerId = developer.getOwnerId();
    await this.developers.delete([developer]);
    if (ownerId !== null) {
      this.accounts.update(ownerId, { developerId: null });
    }
    sendJson(res, 200, { deleted: true });
  }

  /**
   * Record the developer's UUID on its owning account.
   */
  private linkOwner(developer: Developer): void {
    const ownerId = developer.getOwnerId();
    const uuid = developer.uuid();
    if (ownerId !== null && uuid !== null) {
      this.accounts.update(ownerId, { developerId: uuid });
    }
  }

  // ============ App Handlers ============

  private async listUserApps(
    req: IncomingMessage,
    res: ServerResponse,
    params: Record<string, string>
  ): Promise<void> {
    const user = this.accounts.loadById(parseInt(params.uid, 10));
    if (!user) {
      sendError(res, 404, 'User not found');
      return;
    }

    // Without an acting user the request is made as the listed user
    const actingHeader = req.headers[CURRENT_USER_HEADER];
    let currentUser: Account | null = user;
    if (typeof actingHeader === 'string') {
      currentUser = this.accounts.loadById(parseInt(actingHeader, 10));
      if (!currentUser) {
        sendError(res, 400, `Unknown ${CURRENT_USER_HEADER} account`);
        return;
      }
    }

    const builder = new DeveloperAppListBuilder({
      apps: this.apps,
      developers: this.developers,
      currentUser,
      routeMatch: { user, path: `/user/${user.id}/apps` },
      baseUrl: this.baseUrl,
      logger: this.logger,
    });

    sendJson(res, 200, await builder.render());
  }
}
