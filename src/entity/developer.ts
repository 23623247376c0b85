/**
 * Developer entity
 *
 * Local view of a gateway developer. The gateway identifies developers by
 * UUID and looks them up by email; locally a developer is keyed by the
 * email it had when the entity was built ("original email"), which stays
 * put while the live email is edited so the remote record can still be
 * addressed on save.
 */

import type { Account } from '../accounts/types.js';
import { GatewayDeveloper } from '../gateway/developer.js';
import type { RemoteDeveloperResource } from '../gateway/developer.js';
import { DEVELOPER_STATUS_ACTIVE } from '../gateway/types.js';
import type { Attribute, DeveloperData, DeveloperStatus } from '../gateway/types.js';
import { CompanyMembershipCache } from './company-cache.js';
import { UNRESOLVED, resolved } from './types.js';
import type { CompanyState, DeveloperContext } from './types.js';

export interface DeveloperJson extends DeveloperData {
  originalEmail: string | null;
}

export class Developer {
  static readonly ENTITY_TYPE = 'developer';

  private decorated: RemoteDeveloperResource;
  private context: DeveloperContext;

  /** Resolved local account id; read through getOwnerId() */
  private localUserId: number | null = null;

  private originalEmail: string | null;

  private companies: CompanyMembershipCache;

  constructor(decorated: RemoteDeveloperResource, context: DeveloperContext) {
    this.decorated = decorated;
    this.context = context;

    // Callers expect either 'active' or 'inactive', never null
    if (decorated.getStatus() === null) {
      decorated.setStatus(DEVELOPER_STATUS_ACTIVE);
    }

    this.originalEmail = decorated.getEmail();

    // Single-developer responses carry the company list; list responses
    // do not, and an empty list there means "unknown".
    const companies = decorated.getCompanies();
    this.companies = new CompanyMembershipCache({
      controller: context.controller,
      logger: context.logger,
      initial: companies.length > 0 ? resolved(companies) : UNRESOLVED,
    });
  }

  static create(values: DeveloperData, context: DeveloperContext): Developer {
    return new Developer(new GatewayDeveloper(values), context);
  }

  static idProperty(): string {
    return 'originalEmail';
  }

  static uniqueIdProperties(): string[] {
    return ['originalEmail', 'developerId'];
  }

  /**
   * Local primary key.
   */
  id(): string | null {
    return this.originalEmail;
  }

  /**
   * Remote UUID.
   */
  uuid(): string | null {
    return this.decorated.id();
  }

  isNew(): boolean {
    return this.decorated.id() === null;
  }

  label(): string {
    return `${this.getFirstName() ?? ''} ${this.getLastName() ?? ''}`;
  }

  getDeveloperId(): string | null {
    return this.decorated.getDeveloperId();
  }

  getEmail(): string | null {
    return this.decorated.getEmail();
  }

  setEmail(email: string): void {
    this.decorated.setEmail(email);
    if (this.originalEmail === null) {
      this.originalEmail = email;
    }
  }

  getOriginalEmail(): string | null {
    return this.originalEmail;
  }

  resetOriginalEmail(): void {
    this.originalEmail = this.decorated.getEmail();
  }

  getFirstName(): string | null {
    return this.decorated.getFirstName();
  }

  setFirstName(firstName: string): void {
    this.decorated.setFirstName(firstName);
  }

  getLastName(): string | null {
    return this.decorated.getLastName();
  }

  setLastName(lastName: string): void {
    this.decorated.setLastName(lastName);
  }

  getUserName(): string | null {
    return this.decorated.getUserName();
  }

  setUserName(userName: string): void {
    this.decorated.setUserName(userName);
  }

  getStatus(): DeveloperStatus | null {
    return this.decorated.getStatus();
  }

  setStatus(status: DeveloperStatus): void {
    this.decorated.setStatus(status);
  }

  getOrganizationName(): string | null {
    return this.decorated.getOrganizationName();
  }

  getApps(): string[] {
    return this.decorated.getApps();
  }

  hasApp(appName: string): boolean {
    return this.decorated.hasApp(appName);
  }

  /**
   * Companies the developer belongs to. Never rejects on gateway errors;
   * those yield an empty list and the next call tries again.
   */
  async getCompanies(): Promise<string[]> {
    return this.companies.get(this);
  }

  getCompanyState(): CompanyState {
    return this.companies.getState();
  }

  hasCompany(companyName: string): boolean {
    return this.decorated.hasCompany(companyName);
  }

  getAttributes(): Attribute[] {
    return this.decorated.getAttributes();
  }

  setAttributes(attributes: Attribute[]): void {
    this.decorated.setAttributes(attributes);
  }

  getAttributeValue(name: string): string | null {
    return this.decorated.getAttributeValue(name);
  }

  setAttribute(name: string, value: string): void {
    this.decorated.setAttribute(name, value);
  }

  hasAttribute(name: string): boolean {
    return this.decorated.hasAttribute(name);
  }

  deleteAttribute(name: string): void {
    this.decorated.deleteAttribute(name);
  }

  getCreatedAt(): Date | null {
    return this.decorated.getCreatedAt();
  }

  getCreatedBy(): string | null {
    return this.decorated.getCreatedBy();
  }

  getLastModifiedAt(): Date | null {
    return this.decorated.getLastModifiedAt();
  }

  getLastModifiedBy(): string | null {
    return this.decorated.getLastModifiedBy();
  }

  // ============ Owner ============

  /**
   * Id of the local account with the developer's email. A miss is not
   * remembered, so an account created later is picked up.
   */
  getOwnerId(): number | null {
    if (this.localUserId === null) {
      const email = this.getEmail();
      if (email) {
        const account = this.context.accounts.loadByEmail(email);
        if (account) {
          this.localUserId = account.id;
        }
      }
      // User names are not unique on the gateway, so they are not used here
    }
    return this.localUserId;
  }

  /**
   * Assign the owning account. The account's email wins over the
   * developer's.
   */
  setOwnerId(id: number | null): this {
    this.localUserId = id;
    // New accounts have no id yet
    if (id !== null) {
      const account = this.context.accounts.loadById(id);
      if (account !== null && this.getEmail() !== account.email) {
        this.setEmail(account.email);
      }
    }
    return this;
  }

  getOwner(): Account | null {
    const ownerId = this.getOwnerId();
    return ownerId === null ? null : this.context.accounts.loadById(ownerId);
  }

  setOwner(account: Account): this {
    return this.setOwnerId(account.id);
  }

  /**
   * Payload for the gateway.
   */
  toData(): DeveloperData {
    return this.decorated.toJSON();
  }

  toJSON(): DeveloperJson {
    return {
      ...this.decorated.toJSON(),
      originalEmail: this.originalEmail,
    };
  }
}
