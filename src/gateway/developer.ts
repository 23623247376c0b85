import type { Attribute, DeveloperData, DeveloperStatus } from './types.js';

/**
 * Capability interface of a remote developer record.
 *
 * Local entities own one of these and forward to it; nothing else about
 * the remote record leaks into them.
 */
export interface RemoteDeveloperResource {
  /** Remote UUID */
  id(): string | null;
  getDeveloperId(): string | null;
  getEmail(): string | null;
  setEmail(email: string): void;
  getFirstName(): string | null;
  setFirstName(firstName: string): void;
  getLastName(): string | null;
  setLastName(lastName: string): void;
  getUserName(): string | null;
  setUserName(userName: string): void;
  getStatus(): DeveloperStatus | null;
  setStatus(status: DeveloperStatus): void;
  getOrganizationName(): string | null;
  getApps(): string[];
  hasApp(appName: string): boolean;
  getCompanies(): string[];
  hasCompany(companyName: string): boolean;
  getAttributes(): Attribute[];
  setAttributes(attributes: Attribute[]): void;
  getAttributeValue(name: string): string | null;
  setAttribute(name: string, value: string): void;
  hasAttribute(name: string): boolean;
  deleteAttribute(name: string): void;
  getCreatedAt(): Date | null;
  getCreatedBy(): string | null;
  getLastModifiedAt(): Date | null;
  getLastModifiedBy(): string | null;
  toJSON(): DeveloperData;
}

function toDate(value: number | undefined): Date | null {
  return value === undefined ? null : new Date(value);
}

/**
 * Developer record as returned by the management API.
 */
export class GatewayDeveloper implements RemoteDeveloperResource {
  private data: DeveloperData;

  constructor(data: DeveloperData = {}) {
    this.data = {
      ...data,
      apps: [...(data.apps ?? [])],
      companies: [...(data.companies ?? [])],
      attributes: (data.attributes ?? []).map((a) => ({ ...a })),
    };
  }

  id(): string | null {
    return this.data.developerId ?? null;
  }

  getDeveloperId(): string | null {
    return this.data.developerId ?? null;
  }

  getEmail(): string | null {
    return this.data.email ?? null;
  }

  setEmail(email: string): void {
    this.data.email = email;
  }

  getFirstName(): string | null {
    return this.data.firstName ?? null;
  }

  setFirstName(firstName: string): void {
    this.data.firstName = firstName;
  }

  getLastName(): string | null {
    return this.data.lastName ?? null;
  }

  setLastName(lastName: string): void {
    this.data.lastName = lastName;
  }

  getUserName(): string | null {
    return this.data.userName ?? null;
  }

  setUserName(userName: string): void {
    this.data.userName = userName;
  }

  getStatus(): DeveloperStatus | null {
    return this.data.status ?? null;
  }

  setStatus(status: DeveloperStatus): void {
    this.data.status = status;
  }

  getOrganizationName(): string | null {
    return this.data.organizationName ?? null;
  }

  getApps(): string[] {
    return [...(this.data.apps ?? [])];
  }

  hasApp(appName: string): boolean {
    return (this.data.apps ?? []).includes(appName);
  }

  getCompanies(): string[] {
    return [...(this.data.companies ?? [])];
  }

  hasCompany(companyName: string): boolean {
    return (this.data.companies ?? []).includes(companyName);
  }

  getAttributes(): Attribute[] {
    return (this.data.attributes ?? []).map((a) => ({ ...a }));
  }

  setAttributes(attributes: Attribute[]): void {
    this.data.attributes = attributes.map((a) => ({ ...a }));
  }

  getAttributeValue(name: string): string | null {
    const attribute = (this.data.attributes ?? []).find((a) => a.name === name);
    return attribute ? attribute.value : null;
  }

  setAttribute(name: string, value: string): void {
    const attributes = (this.data.attributes ?? []).filter((a) => a.name !== name);
    attributes.push({ name, value });
    this.data.attributes = attributes;
  }

  hasAttribute(name: string): boolean {
    return (this.data.attributes ?? []).some((a) => a.name === name);
  }

  deleteAttribute(name: string): void {
    this.data.attributes = (this.data.attributes ?? []).filter((a) => a.name !== name);
  }

  getCreatedAt(): Date | null {
    return toDate(this.data.createdAt);
  }

  getCreatedBy(): string | null {
    return this.data.createdBy ?? null;
  }

  getLastModifiedAt(): Date | null {
    return toDate(this.data.lastModifiedAt);
  }

  getLastModifiedBy(): string | null {
    return this.data.lastModifiedBy ?? null;
  }

  toJSON(): DeveloperData {
    return {
      ...this.data,
      apps: this.getApps(),
      companies: this.getCompanies(),
      attributes: this.getAttributes(),
    };
  }
}
