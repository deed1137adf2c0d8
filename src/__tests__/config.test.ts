/**
 * Tests for settings resolution
 *
 * Usage: node --import tsx --test src/__tests__/config.test.ts
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import path from 'node:path';
import { loadGraphCredentials, loadLdapSettings, resolveReportPath } from '../config.js';
import { ConfigError } from '../errors.js';

const GRAPH_ENV = {
  AZURE_TENANT_ID: 'tenant-from-env',
  AZURE_CLIENT_ID: 'client-from-env',
  AZURE_CLIENT_SECRET: 'test-secret'
};

const LDAP_ENV = {
  LDAP_URL: 'ldaps://dc01.corp.example:636',
  LDAP_BIND_DN: 'CN=svc-reports,DC=corp,DC=example',
  LDAP_BIND_PASSWORD: 'test-secret',
  LDAP_BASE_DN: 'DC=corp,DC=example'
};

describe('loadGraphCredentials', () => {
  it('reads the environment', () => {
    assert.deepStrictEqual(loadGraphCredentials({}, GRAPH_ENV), {
      tenantId: 'tenant-from-env',
      clientId: 'client-from-env',
      clientSecret: 'test-secret'
    });
  });

  it('prefers command-line values and trims them', () => {
    const credentials = loadGraphCredentials({ tenantId: ' tenant-from-flag ', clientId: '' }, GRAPH_ENV);
    assert.strictEqual(credentials.tenantId, 'tenant-from-flag');
    assert.strictEqual(credentials.clientId, 'client-from-env');
  });

  it('names the flag and variable of a missing setting', () => {
    assert.throws(
      () => loadGraphCredentials({}, { ...GRAPH_ENV, AZURE_CLIENT_SECRET: ' ' }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.strictEqual(err.setting, 'AZURE_CLIENT_SECRET');
        assert.strictEqual(err.message, 'Missing required setting: pass --client-secret or set AZURE_CLIENT_SECRET');
        return true;
      }
    );
  });
});

describe('loadLdapSettings', () => {
  it('reads the environment with default timeouts', () => {
    assert.deepStrictEqual(loadLdapSettings({}, LDAP_ENV), {
      url: 'ldaps://dc01.corp.example:636',
      bindDN: 'CN=svc-reports,DC=corp,DC=example',
      bindPassword: 'test-secret',
      baseDN: 'DC=corp,DC=example',
      timeout: 30000,
      connectTimeout: 10000
    });
  });

  it('reads timeouts from the environment', () => {
    const settings = loadLdapSettings(
      { baseDn: 'OU=Staff,DC=corp,DC=example' },
      { ...LDAP_ENV, LDAP_TIMEOUT_MS: '5000', LDAP_CONNECT_TIMEOUT_MS: '2500' }
    );
    assert.strictEqual(settings.baseDN, 'OU=Staff,DC=corp,DC=example');
    assert.strictEqual(settings.timeout, 5000);
    assert.strictEqual(settings.connectTimeout, 2500);
  });

  it('rejects a timeout that is not a positive integer', () => {
    assert.throws(
      () => loadLdapSettings({}, { ...LDAP_ENV, LDAP_TIMEOUT_MS: 'soon' }),
      { name: 'ConfigError', message: 'LDAP_TIMEOUT_MS must be a positive integer, got "soon"' }
    );
    assert.throws(() => loadLdapSettings({}, { ...LDAP_ENV, LDAP_CONNECT_TIMEOUT_MS: '0' }), ConfigError);
  });

  it('requires a base DN', () => {
    const { LDAP_BASE_DN: _omitted, ...env } = LDAP_ENV;
    assert.throws(() => loadLdapSettings({}, env), {
      message: 'Missing required setting: pass --base-dn or set LDAP_BASE_DN'
    });
  });
});

describe('resolveReportPath', () => {
  it('prefers the explicit value', () => {
    assert.strictEqual(
      resolveReportPath('out/a.csv', 'MFA_REPORT_PATH', 'mfa-report.csv', { MFA_REPORT_PATH: '/reports/b.csv' }),
      path.resolve('out/a.csv')
    );
  });

  it('falls back to the environment, then the default', () => {
    assert.strictEqual(
      resolveReportPath(undefined, 'MFA_REPORT_PATH', 'mfa-report.csv', { MFA_REPORT_PATH: '/reports/b.csv' }),
      '/reports/b.csv'
    );
    assert.strictEqual(resolveReportPath(' ', 'MFA_REPORT_PATH', 'mfa-report.csv', {}), path.resolve('mfa-report.csv'));
  });
});
