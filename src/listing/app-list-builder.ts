/**
 * Developer App List Builder
 *
 * Lists the apps of the developer behind the `{user}` route parameter, as
 * shown on a user's "Apps" page.
 */

import type { Account } from '../accounts/types.js';
import { DeveloperApp, ADMINISTER_APPS_PERMISSION } from '../entity/app.js';
import type { DeveloperStorage } from '../entity/developer-storage.js';
import type { DeveloperAppController } from '../gateway/app-controller.js';
import { ApiException, DeveloperDoesNotExistException } from '../gateway/errors.js';
import { DEVELOPER_STATUS_INACTIVE } from '../gateway/types.js';
import { decodeException } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { HtmlIdGenerator } from './html-id.js';
import type { AppListing, AppNameCell, AppRow, Link, Operation, Redirect, RouteMatch } from './types.js';

export const EMPTY_LIST_TEXT = 'Looks like you do not have any apps. Get started by adding one.';

const STATUS_LABELS: Record<string, string> = {
  approved: 'Approved',
  revoked: 'Revoked',
  pending: 'Pending',
};

export interface DeveloperAppListBuilderOptions {
  apps: DeveloperAppController;
  developers: DeveloperStorage;
  currentUser: Account;
  routeMatch: RouteMatch;
  /** Absolute site URL, for redirects */
  baseUrl: string;
  logger: Logger;
  /** Plural label of developer apps */
  pluralLabel?: string;
  htmlIds?: HtmlIdGenerator;
}

export class DeveloperAppListBuilder {
  private apps: DeveloperAppController;
  private developers: DeveloperStorage;
  private currentUser: Account;
  private routeMatch: RouteMatch;
  private baseUrl: string;
  private logger: Logger;
  private pluralLabel: string;
  private htmlIds: HtmlIdGenerator;

  /** Generated CSS ids by app name */
  private appNameCssIdCache: Map<string, string> = new Map();

  constructor(options: DeveloperAppListBuilderOptions) {
    this.apps = options.apps;
    this.developers = options.developers;
    this.currentUser = options.currentUser;
    this.routeMatch = options.routeMatch;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.logger = options.logger;
    this.pluralLabel = options.pluralLabel ?? 'Apps';
    this.htmlIds = options.htmlIds ?? new HtmlIdGenerator();
  }

  /**
   * Developer UUID the listing is filtered by.
   */
  buildEntityIdQuery(): { developerId: string } {
    const user = this.requireUser();
    // No developer id means either a connection error or a site that is
    // out of sync with the gateway
    if (user.developerId === null) {
      throw new DeveloperDoesNotExistException(user.email);
    }
    return { developerId: user.developerId };
  }

  async load(): Promise<DeveloperApp[]> {
    const { developerId } = this.buildEntityIdQuery();
    const apps = await this.apps.listByDeveloper(developerId);
    return apps.map((app) => new DeveloperApp(app));
  }

  getDefaultOperations(app: DeveloperApp): Record<string, Operation> {
    const operations: Record<string, Operation> = {};
    if (app.access('update', this.currentUser)) {
      operations.edit = { title: 'Edit', weight: 10, url: app.toUrl('edit-form') };
    }
    if (app.access('delete', this.currentUser)) {
      operations.delete = { title: 'Delete', weight: 100, url: app.toUrl('delete-form') };
    }

    const user = this.routeMatch.user;
    if (!user) {
      return operations;
    }

    for (const [operation, parameters] of Object.entries(operations)) {
      if (app.hasLinkTemplate(`${operation}-for-developer`)) {
        parameters.url = app.toUrl(`${operation}-for-developer`, { user: user.id });
      }
      if (app.hasLinkTemplate(`${operation}-form-for-developer`)) {
        parameters.url = this.ensureDestination(app.toUrl(`${operation}-form-for-developer`, { user: user.id }));
      }
    }
    return operations;
  }

  /**
   * Same id for an app on every call within this builder.
   */
  generateCssIdForApp(app: DeveloperApp): string {
    const name = app.getName();
    let id = this.appNameCssIdCache.get(name);
    if (id === undefined) {
      id = this.htmlIds.getUniqueId(name);
      this.appNameCssIdCache.set(name, id);
    }
    return id;
  }

  getAddEntityLink(): Link | null {
    const user = this.routeMatch.user;
    if (!user) {
      return null;
    }
    const isOwner = user.id === this.currentUser.id;
    if (!isOwner && !this.currentUser.permissions.includes(ADMINISTER_APPS_PERMISSION)) {
      return null;
    }
    return { title: 'Add app', url: `/user/${user.id}/apps/create` };
  }

  renderAppName(app: DeveloperApp): AppNameCell {
    const user = this.routeMatch.user;
    if (user && app.access('view', this.currentUser)) {
      return { text: app.label(), url: app.toUrl('canonical-by-developer', { user: user.id }) };
    }
    return { text: app.label() };
  }

  buildRow(app: DeveloperApp): AppRow {
    const status = app.getStatus();
    return {
      id: this.generateCssIdForApp(app),
      name: this.renderAppName(app),
      status: status === null ? '' : STATUS_LABELS[status] ?? status,
      operations: this.getDefaultOperations(app),
    };
  }

  async render(): Promise<AppListing> {
    const apps = await this.load();
    const user = this.requireUser();
    const warnings = await this.checkDeveloperStatus(user);

    return {
      title: this.pageTitle(),
      table: {
        rows: apps.map((app) => this.buildRow(app)),
        empty: EMPTY_LIST_TEXT,
      },
      addLink: this.getAddEntityLink(),
      warnings,
    };
  }

  /**
   * Warnings about an inactive developer; its credentials do not work
   * until it is activated again.
   */
  async checkDeveloperStatus(user: Account): Promise<string[]> {
    let status: string | null;
    try {
      const developer = await this.developers.load(user.email);
      status = developer ? developer.getStatus() : null;
    } catch (error) {
      if (!(error instanceof ApiException)) {
        throw error;
      }
      this.logger.warning('Unable to check the status of %developer developer. @message', {
        '%developer': user.email,
        ...decodeException(error),
      });
      return [];
    }

    if (status !== DEVELOPER_STATUS_INACTIVE) {
      return [];
    }
    if (user.id === this.currentUser.id) {
      return [
        'Your developer account has inactive status so you will not be able to use your credentials until your account gets activated. Please contact support for further assistance.',
      ];
    }
    return [
      `The developer account of ${user.name} has inactive status so this user has invalid credentials until the account gets activated.`,
    ];
  }

  /**
   * Redirect to the current user's own apps page.
   */
  myAppsPage(): Redirect {
    return { status: 302, location: `${this.baseUrl}/user/${this.currentUser.id}/apps` };
  }

  pageTitle(): string {
    const account = this.routeMatch.user;
    if (account && account.id !== this.currentUser.id) {
      return `${this.pluralLabel} of ${account.name}`;
    }
    return `My ${this.pluralLabel}`;
  }

  private ensureDestination(url: string): string {
    const separator = url.includes('?') ? '&' : '?';
    return `${url}${separator}destination=${encodeURIComponent(this.routeMatch.path)}`;
  }

  private requireUser(): Account {
    const user = this.routeMatch.user;
    if (!user) {
      throw new Error('The "user" route parameter is missing');
    }
    return user;
  }
}
