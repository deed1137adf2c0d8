/**
 * Tests for authentication method flags and MFA status
 *
 * Usage: node --import tsx --test src/collector/__tests__/authMethods.test.ts
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { AUTH_METHOD_TAGS, buildMfaRecord, resolveAuthMethodKind } from '../authMethods.js';
import { AUTH_METHOD_KINDS } from '../../types.js';

const tag = (name: string) => ({ typeTag: `#microsoft.graph.${name}AuthenticationMethod` });

describe('resolveAuthMethodKind', () => {
  it('maps every known tag to a distinct kind', () => {
    const kinds = Object.keys(AUTH_METHOD_TAGS).map(resolveAuthMethodKind);
    assert.deepStrictEqual([...kinds].sort(), [...AUTH_METHOD_KINDS].sort());
  });

  it('maps the authenticator app tag to "app"', () => {
    assert.strictEqual(resolveAuthMethodKind('#microsoft.graph.microsoftAuthenticatorAuthenticationMethod'), 'app');
  });

  it('returns undefined for unknown tags', () => {
    assert.strictEqual(resolveAuthMethodKind('#microsoft.graph.qrCodePinAuthenticationMethod'), undefined);
    assert.strictEqual(resolveAuthMethodKind(''), undefined);
  });

  it('does not resolve inherited object keys', () => {
    assert.strictEqual(resolveAuthMethodKind('toString'), undefined);
    assert.strictEqual(resolveAuthMethodKind('constructor'), undefined);
  });
});

describe('buildMfaRecord', () => {
  it('password plus authenticator app is Enabled', () => {
    const record = buildMfaRecord('alice@corp.example', [tag('password'), tag('microsoftAuthenticator')]);
    assert.strictEqual(record.principalName, 'alice@corp.example');
    assert.strictEqual(record.mfaStatus, 'Enabled');
    assert.strictEqual(record.app, true);
    assert.strictEqual(record.password, true);
    assert.strictEqual(record.email, false);
    assert.strictEqual(record.phone, false);
  });

  it('no methods is Disabled with every flag false', () => {
    const record = buildMfaRecord('bob@corp.example', []);
    assert.strictEqual(record.mfaStatus, 'Disabled');
    for (const kind of AUTH_METHOD_KINDS) {
      assert.strictEqual(record[kind], false, kind);
    }
  });

  it('an unknown method sets no flag and leaves MFA Disabled', () => {
    const record = buildMfaRecord('carol@corp.example', [{ typeTag: '#microsoft.graph.platformCredentialAuthenticationMethod' }]);
    assert.strictEqual(record.mfaStatus, 'Disabled');
    for (const kind of AUTH_METHOD_KINDS) {
      assert.strictEqual(record[kind], false, kind);
    }
  });

  it('password only is Disabled', () => {
    const record = buildMfaRecord('dave@corp.example', [tag('password')]);
    assert.strictEqual(record.mfaStatus, 'Disabled');
    assert.strictEqual(record.password, true);
  });

  it('each non-password method alone enables MFA', () => {
    for (const [typeTag, kind] of Object.entries(AUTH_METHOD_TAGS)) {
      if (kind === 'password') continue;
      const record = buildMfaRecord('eve@corp.example', [{ typeTag }]);
      assert.strictEqual(record.mfaStatus, 'Enabled', typeTag);
      assert.strictEqual(record[kind], true, typeTag);
    }
  });

  it('repeated methods set the flag once', () => {
    const record = buildMfaRecord('frank@corp.example', [tag('phone'), tag('phone'), tag('fido2')]);
    assert.strictEqual(record.phone, true);
    assert.strictEqual(record.fido2, true);
    assert.strictEqual(record.mfaStatus, 'Enabled');
  });
});
