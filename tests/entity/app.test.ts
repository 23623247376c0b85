import { describe, it, expect } from 'vitest';
import type { Account } from '../../src/accounts/types.js';
import { DeveloperApp, ADMINISTER_APPS_PERMISSION } from '../../src/entity/app.js';
import { GatewayApp } from '../../src/gateway/app.js';

const account = (overrides: Partial<Account> = {}): Account => ({
  id: 1,
  email: 'ada@example.com',
  name: 'ada',
  developerId: null,
  permissions: [],
  ...overrides,
});

describe('DeveloperApp', () => {
  const app = new DeveloperApp(
    new GatewayApp({ appId: 'app-1', name: 'my app', developerId: 'uuid-1', attributes: [{ name: 'DisplayName', value: 'My App' }] })
  );

  it('labels the app by display name, then name', () => {
    expect(app.label()).toBe('My App');
    expect(new DeveloperApp(new GatewayApp({ name: 'plain' })).label()).toBe('plain');
  });

  it('fills link templates from the app and the parameters', () => {
    expect(app.toUrl('canonical')).toBe('/developer-apps/app-1');
    expect(app.toUrl('edit-form-for-developer', { user: 7 })).toBe('/user/7/apps/my%20app/edit');
  });

  it('rejects unknown templates and missing parameters', () => {
    expect(app.hasLinkTemplate('edit-for-developer')).toBe(false);
    expect(() => app.toUrl('edit-for-developer')).toThrow('No "edit-for-developer" link template for developer apps');
    expect(() => app.toUrl('canonical-by-developer')).toThrow('Missing "user" parameter for the "canonical-by-developer" link');
  });

  it('grants access to its developer and to administrators', () => {
    expect(app.access('view', account({ developerId: 'uuid-1' }))).toBe(true);
    expect(app.access('update', account({ developerId: 'uuid-2' }))).toBe(false);
    expect(app.access('delete', account({ permissions: [ADMINISTER_APPS_PERMISSION] }))).toBe(true);
  });
});
